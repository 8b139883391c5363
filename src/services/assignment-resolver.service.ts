import type { Logger } from 'winston';
import type { PrinterAssignmentRepository } from '../db/printer-assignment.repository';
import type { PrinterTargetRepository } from '../db/printer-target.repository';
import type { CategoryRef, PrinterAssignment } from '../models/printer.dto';
import type { KitchenOrderItem } from '../models/kitchen-order.dto';

/** Priority descending, then oldest first, then id for a stable order */
export function compareAssignments(a: PrinterAssignment, b: PrinterAssignment): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const byAge = a.createdAt.getTime() - b.createdAt.getTime();
  if (byAge !== 0) return byAge;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Maps menu items to printers. Item-level assignments shadow category-level
 * ones completely; an item with no assignment at either level resolves to
 * no printers.
 */
export class AssignmentResolverService {
  private assignments: PrinterAssignment[] = [];
  private initialized = false;

  constructor(
    private readonly repository: PrinterAssignmentRepository,
    private readonly printers: PrinterTargetRepository,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  isInitialized(): boolean {
    return this.initialized;
  }

  initialize(): void {
    this.reload();
    this.initialized = true;
  }

  /**
   * Re-read assignments from storage. Returns how many were loaded.
   */
  reload(): number {
    this.assignments = [...this.repository.findAll()].sort(compareAssignments);
    this.logger.info('Loaded printer assignments', { count: this.assignments.length });
    return this.assignments.length;
  }

  /**
   * Active assignments that apply to an item, highest priority first
   */
  getAssignmentsFor(menuItemId: string, categoryId: string | null): PrinterAssignment[] {
    const itemLevel = this.assignments.filter(
      (a) => a.isActive && a.level === 'item' && a.targetId === menuItemId,
    );
    if (itemLevel.length > 0) return itemLevel;
    if (!categoryId) return [];

    return this.assignments.filter(
      (a) => a.isActive && a.level === 'category' && a.targetId === categoryId,
    );
  }

  resolveTargets(menuItemId: string, categoryId: string | null): string[] {
    const printerIds: string[] = [];
    for (const assignment of this.getAssignmentsFor(menuItemId, categoryId)) {
      if (!printerIds.includes(assignment.printerId)) {
        printerIds.push(assignment.printerId);
      }
    }
    return printerIds;
  }

  /** Highest-priority printer for an item, or null */
  resolveSingleTarget(menuItemId: string, categoryId: string | null): string | null {
    return this.resolveTargets(menuItemId, categoryId)[0] ?? null;
  }

  /**
   * Groups items by printer. An item with several printers lands in every group.
   * Groups are keyed in first-seen order.
   */
  segregateByPrinter(items: KitchenOrderItem[]): Map<string, KitchenOrderItem[]> {
    const groups = new Map<string, KitchenOrderItem[]>();
    for (const item of items) {
      for (const printerId of this.resolveTargets(item.menuItemId, item.categoryId)) {
        const group = groups.get(printerId);
        if (group) {
          group.push(item);
        } else {
          groups.set(printerId, [item]);
        }
      }
    }
    return groups;
  }

  /**
   * Distribute categories that have no category-level assignment over the
   * active printers, round-robin.
   */
  autoAssignCategories(categories: CategoryRef[]): PrinterAssignment[] {
    const printers = this.printers.findActive();
    if (printers.length === 0) {
      this.logger.warn('Auto-assign skipped: no active printers');
      return [];
    }

    const covered = new Set(
      this.assignments.filter((a) => a.isActive && a.level === 'category').map((a) => a.targetId),
    );

    const created: PrinterAssignment[] = [];
    let cursor = 0;
    const at = this.now();

    for (const category of categories) {
      if (covered.has(category.id)) continue;

      const printer = printers[cursor % printers.length];
      cursor += 1;
      if (!printer) continue;

      const assignment = this.repository.create(
        { printerId: printer.id, level: 'category', targetId: category.id, targetName: category.name },
        at,
      );
      if (assignment) {
        created.push(assignment);
        covered.add(category.id);
      }
    }

    if (created.length > 0) {
      this.reload();
      this.logger.info('Auto-assigned categories to printers', { created: created.length });
    }
    return created;
  }
}
