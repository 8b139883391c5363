export type RelayConnectionState = 'idle' | 'connecting' | 'connected' | 'reconnecting' | 'down';

export interface RelayRegistration {
  name: string;
  printerId?: string;
  capabilities: string[];
}

export interface RelayPrintJobPayload {
  jobId: string;
  orderId: string;
  orderNumber: string;
  restaurantId: string;
  targetPrinterId: string;
  content: string;
  items: Array<{ id: string; name: string; quantity: number }>;
  priority: number;
  timestamp: string;
}

export interface RelayHeartbeatPayload {
  status: 'active';
  pendingOrders: number;
  failedOrders: number;
}

export interface RelaySessionSnapshot {
  state: RelayConnectionState;
  sessionId: string | null;
  lastHeartbeatAt: string | null;
  heartbeatFailures: number;
  reconnectAttempts: number;
}
