import type {
  FinalState,
  MergeOutcome,
  MergeStats,
  MergedOrder,
  ParsedEvent,
} from './types.js';
import { DataTransforms } from './transforms.js';
import type { Logger } from './utils.js';

/**
 * Folds parsed events into one winning report per order id.
 *
 * A report replaces the stored one only when its timestamp is strictly later,
 * and then replaces it whole: header and every detail line. Equal timestamps
 * keep whichever report was applied first, so the outcome depends on the
 * order events are applied in (ascending file name for a pipeline run).
 */
export class MergeEngine {
  private orders = new Map<number, MergedOrder>();
  private counts: MergeStats = { inserted: 0, replaced: 0, discarded: 0 };

  constructor(private logger: Logger) {}

  apply(event: ParsedEvent): MergeOutcome {
    const existing = this.orders.get(event.orderId);

    if (!existing) {
      this.logger.debug(`Seeing order ${event.orderId} for the first time`);
      this.orders.set(event.orderId, MergeEngine.toMergedOrder(event));
      this.counts.inserted++;
      return 'inserted';
    }

    if (event.timestamp.getTime() > existing.order.timestamp.getTime()) {
      this.logger.debug(
        `Replacing order ${event.orderId}: ` +
        `${DataTransforms.formatTimestamp(event.timestamp)} supersedes ` +
        `${DataTransforms.formatTimestamp(existing.order.timestamp)}`
      );
      this.orders.set(event.orderId, MergeEngine.toMergedOrder(event));
      this.counts.replaced++;
      return 'replaced';
    }

    this.logger.debug(
      `Discarding report for order ${event.orderId}: ` +
      `${DataTransforms.formatTimestamp(event.timestamp)} is not later than ` +
      `${DataTransforms.formatTimestamp(existing.order.timestamp)}`
    );
    this.counts.discarded++;
    return 'discarded';
  }

  get size(): number {
    return this.orders.size;
  }

  stats(): MergeStats {
    return { ...this.counts };
  }

  /** Winning orders in the order their ids were first seen. */
  snapshot(): FinalState {
    const merged = [...this.orders.values()];
    return {
      orders: merged.map(entry => ({ ...entry.order })),
      details: merged.flatMap(entry => entry.details.map(detail => ({ ...detail }))),
    };
  }

  private static toMergedOrder(event: ParsedEvent): MergedOrder {
    return {
      order: {
        order_id: event.orderId,
        timestamp: event.timestamp,
        status: event.status,
        cost: event.cost,
        technician: event.technician,
      },
      details: event.parts.map(part => ({
        order_id: event.orderId,
        part_name: part.partName,
        quantity: part.quantity,
      })),
    };
  }
}
