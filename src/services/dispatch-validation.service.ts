import type { Logger } from 'winston';
import type { KitchenOrder } from '../models/kitchen-order.dto';
import type { PrinterTarget } from '../models/printer.dto';
import type {
  ValidationFailureDetails,
  ValidationFailureKind,
  ValidationResult,
} from '../models/dispatch.dto';
import type { PrinterTargetRepository } from '../db/printer-target.repository';
import type { AssignmentResolverService } from './assignment-resolver.service';
import type { ReachabilityChecker } from './printer-status.service';
import { errorMessage } from '../utils/logger';

function failure(
  kind: ValidationFailureKind,
  message: string,
  details?: ValidationFailureDetails,
): ValidationResult {
  return details ? { isValid: false, kind, message, details } : { isValid: false, kind, message };
}

function bulleted(lines: string[]): string {
  return lines.map((line) => `• ${line}`).join('\n');
}

function hasValidAddress(printer: PrinterTarget): boolean {
  return printer.host.trim().length > 0 && Number.isInteger(printer.port) && printer.port > 0 && printer.port <= 65535;
}

interface CheckOptions {
  checkReachability: boolean;
}

interface RequiredPrinter {
  id: string;
  printer: PrinterTarget | null;
}

/**
 * Pre-flight checks run before anything about an order is changed. Checks run
 * in a fixed order and stop at the first failure.
 *
 * `validate` is the advisory check operators run and includes reachability.
 * `validateForDispatch` is what the orchestrator runs: an offline printer does
 * not block a send, its ticket fails at transmission and is queued instead.
 */
export class DispatchValidationService {
  constructor(
    private readonly resolver: AssignmentResolverService,
    private readonly printers: PrinterTargetRepository,
    private readonly reachability: ReachabilityChecker,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  validate(order: KitchenOrder): Promise<ValidationResult> {
    return this.check(order, { checkReachability: true });
  }

  validateForDispatch(order: KitchenOrder): Promise<ValidationResult> {
    return this.check(order, { checkReachability: false });
  }

  /** true when `validate` would pass */
  async quickValidate(order: KitchenOrder): Promise<boolean> {
    const result = await this.validate(order);
    return result.isValid;
  }

  private async check(order: KitchenOrder, options: CheckOptions): Promise<ValidationResult> {
    try {
      if (order.items.length === 0) {
        return failure('no_items', 'Order has no items to send to kitchen');
      }

      const newItems = order.items.filter((item) => !item.sentToKitchen);
      if (newItems.length === 0) {
        return failure('all_items_sent', 'All items have already been sent to kitchen');
      }

      if (!this.resolver.isInitialized()) {
        return failure('service_not_ready', 'Printer assignment service is not initialized');
      }

      // Coverage
      const unassignedItems = newItems
        .filter((item) => this.resolver.resolveTargets(item.menuItemId, item.categoryId).length === 0)
        .map((item) => item.menuItemName);

      if (unassignedItems.length > 0) {
        return failure(
          'missing_assignments',
          `The following items have no printer assignments:\n${bulleted(unassignedItems)}\n\n` +
            'Please assign these items to printers before sending to kitchen.',
          { unassignedItems, totalItems: newItems.length },
        );
      }

      const requiredPrinterIds = [...this.resolver.segregateByPrinter(newItems).keys()];
      if (requiredPrinterIds.length === 0) {
        return failure('no_printers_found', 'No printers found for order items');
      }

      const required = requiredPrinterIds.map((id) => ({ id, printer: this.printers.findById(id) }));

      if (options.checkReachability) {
        const offline = await this.checkConnectivity(required);
        if (offline) return offline;
      }

      // Configuration
      if (this.printers.findActive().length === 0) {
        return failure('no_printers_configured', 'No active printers configured. Please configure at least one printer.');
      }

      const issues: string[] = [];
      for (const { id, printer } of required) {
        if (!printer) {
          issues.push(`Printer ${id} not found in configuration`);
          continue;
        }
        if (!printer.isActive) {
          issues.push(`${printer.name} is disabled`);
        }
        if (printer.connection === 'network' && !hasValidAddress(printer)) {
          issues.push(`${printer.name} has invalid network configuration`);
        }
      }

      if (issues.length > 0) {
        return failure('configuration_issues', `Printer configuration issues:\n${bulleted(issues)}`, { issues });
      }

      return {
        isValid: true,
        message: 'Order validated successfully for kitchen submission',
        details: {
          totalItems: order.items.length,
          newItems: newItems.length,
          requiredPrinters: requiredPrinterIds.length,
          orderNumber: order.orderNumber,
          validatedAt: this.now().toISOString(),
        },
      };
    } catch (error) {
      this.logger.error('Kitchen validation failed unexpectedly', { orderId: order.id, error: errorMessage(error) });
      return failure('system_error', `Validation failed: ${errorMessage(error)}`);
    }
  }

  private async checkConnectivity(required: RequiredPrinter[]): Promise<ValidationResult | null> {
    const reachable = await Promise.all(
      required.map(({ printer }) => (printer ? this.reachability.isReachable(printer) : Promise.resolve(false))),
    );

    const offlinePrinters: string[] = [];
    const onlinePrinters: string[] = [];
    required.forEach(({ id, printer }, index) => {
      if (!printer) {
        offlinePrinters.push(`Unknown Printer (${id})`);
      } else if (reachable[index]) {
        onlinePrinters.push(printer.name);
      } else {
        offlinePrinters.push(`${printer.name} (${printer.host}:${printer.port})`);
      }
    });

    if (offlinePrinters.length === 0) return null;

    return failure(
      'printers_offline',
      `The following printers are offline or unreachable:\n${bulleted(offlinePrinters)}\n\n` +
        'Please check printer connections and try again.',
      { offlinePrinters, onlinePrinters },
    );
  }
}
