export interface KitchenOrderItem {
  id: string;
  menuItemId: string;
  menuItemName: string;
  categoryId: string | null;
  quantity: number;
  variant: string | null;
  modifiers: string[];
  specialInstructions: string | null;
  notes: string | null;
  sentToKitchen: boolean;
}

export interface KitchenOrder {
  id: string;
  orderNumber: string;
  tableLabel: string | null;
  customerName: string | null;
  serverName: string | null;
  isUrgent: boolean;
  priority: number;
  createdAt: Date;
  items: KitchenOrderItem[];
}

/**
 * Who asked for the dispatch. Carried into audit entries.
 */
export interface DispatchActor {
  id: string;
  name: string;
}
