// קובץ: packages/wemo-core/src/renewalScheduler.ts

import { EventEmitter } from 'node:events';

import { config } from './config';
import { errorMessage } from './errors';
import { createModuleLogger } from './logger';
import type { SubscriptionRegistry } from './subscriptionRegistry';
import type { RenewalSchedulerOptions, Subscription } from './types';

const logger = createModuleLogger('RenewalScheduler');

// setTimeout לא מקבל השהיה מעל 2^31-1 ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * מצבי החידוש של מנוי אחד:
 * renewing -> renewed
 * renewing -> resubscribing -> resubscribed | lost | cancelled
 * renewing -> cancelled (המנוי בוטל לפני או במהלך החידוש)
 */
export type RenewalState = 'renewing' | 'resubscribing' | 'renewed' | 'resubscribed' | 'lost' | 'cancelled';
export type RenewalOutcome = Exclude<RenewalState, 'renewing' | 'resubscribing'>;

export interface RenewalSchedulerEvents {
  renewed: [subscriptionId: string, expiresAt: number];
  resubscribed: [previousId: string, newId: string];
  lost: [subscriptionId: string, error: Error];
  settled: [subscriptionId: string, outcome: RenewalOutcome];
}

/**
 * @internal
 * מחדש מנויים לפני שהם פגים. טיימר אחד מכוון תמיד למועד החידוש הקרוב ביותר
 * (grantedAt + renewFraction * grantedSeconds) ומכוון מחדש על כל שינוי ברישום.
 * חידוש שנכשל מנסה מנוי חדש פעם אחת; אם גם זה נכשל המנוי אבוד ו-onSubscriptionLost נקרא.
 */
export class RenewalScheduler extends EventEmitter<RenewalSchedulerEvents> {
  private readonly registry: SubscriptionRegistry;
  private readonly renewFraction: number;
  private readonly inFlight = new Set<string>();
  private readonly inFlightRuns = new Set<Promise<void>>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  private readonly onRegistryChange = (): void => this.reschedule();

  constructor(registry: SubscriptionRegistry, options: RenewalSchedulerOptions = {}) {
    super();
    const renewFraction = options.renewFraction ?? config.renewal.renewFraction;
    if (!(renewFraction > 0 && renewFraction < 1)) {
      throw new RangeError(`renewFraction must be between 0 and 1 (exclusive), got ${renewFraction}`);
    }
    this.registry = registry;
    this.renewFraction = renewFraction;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.registry.on('subscribed', this.onRegistryChange);
    this.registry.on('renewed', this.onRegistryChange);
    this.registry.on('removed', this.onRegistryChange);
    this.reschedule();
    logger.debug(`Renewal scheduler started (renew at ${Math.round(this.renewFraction * 100)}% of each grant)`);
  }

  /**
   * @hebrew עוצר את הטיימר וממתין לחידושים שכבר רצים.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.clearTimer();
    this.registry.off('subscribed', this.onRegistryChange);
    this.registry.off('renewed', this.onRegistryChange);
    this.registry.off('removed', this.onRegistryChange);
    await Promise.allSettled([...this.inFlightRuns]);
    logger.debug('Renewal scheduler stopped');
  }

  /** מועד החידוש המתוכנן (ms epoch) של מנוי. */
  renewAt(subscription: Subscription): number {
    return subscription.grantedAt + Math.round(subscription.grantedSeconds * 1000 * this.renewFraction);
  }

  /** מועד ההפעלה הבא של הטיימר, או null אם אין מה לחדש. */
  nextRenewalAt(): number | null {
    let earliest: number | null = null;
    for (const subscription of this.registry.list()) {
      if (this.inFlight.has(subscription.id)) continue;
      const at = this.renewAt(subscription);
      if (earliest === null || at < earliest) earliest = at;
    }
    return earliest;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private reschedule(): void {
    this.clearTimer();
    if (!this.running) return;

    const next = this.nextRenewalAt();
    if (next === null) return;

    const delayMs = Math.min(Math.max(0, next - Date.now()), MAX_TIMER_DELAY_MS);
    this.timer = setTimeout(() => this.onTimer(), delayMs);
    this.timer.unref();
    logger.trace(`Next renewal check in ${delayMs}ms`);
  }

  private onTimer(): void {
    this.timer = null;
    const now = Date.now();
    const due = this.registry.list().filter(s => !this.inFlight.has(s.id) && this.renewAt(s) <= now);

    for (const subscription of due) {
      this.inFlight.add(subscription.id);
      const run: Promise<void> = (async () => {
        let outcome: RenewalOutcome | undefined;
        try {
          outcome = await this.runRenewal(subscription.id);
        } catch (error: unknown) {
          logger.error(`Unexpected failure while renewing ${subscription.id}`, { error });
        } finally {
          this.inFlight.delete(subscription.id);
          this.inFlightRuns.delete(run);
          this.reschedule();
        }
        if (outcome) {
          this.emit('settled', subscription.id, outcome);
        }
      })();
      this.inFlightRuns.add(run);
    }
    this.reschedule();
  }

  private transition(subscriptionId: string, from: RenewalState, to: RenewalState): RenewalState {
    logger.trace(`${subscriptionId}: ${from} -> ${to}`);
    return to;
  }

  private async runRenewal(subscriptionId: string): Promise<RenewalOutcome> {
    let state: RenewalState = 'renewing';

    // המנוי עשוי להיות מבוטל בין הכוונת הטיימר להפעלתו
    const subscription = this.registry.describe(subscriptionId);
    if (!subscription) {
      this.transition(subscriptionId, state, 'cancelled');
      return 'cancelled';
    }

    let renewError: Error;
    try {
      const expiresAt = await this.registry.renew(subscriptionId, { holdForResubscribe: true });
      this.transition(subscriptionId, state, 'renewed');
      this.emit('renewed', subscriptionId, expiresAt);
      return 'renewed';
    } catch (error: unknown) {
      renewError = error instanceof Error ? error : new Error(String(error));
    }

    // לא ממתין להחלפה: בוטל במהלך החידוש או שהמתזמן נעצר
    if (!this.registry.isLapsed(subscriptionId) || !this.running) {
      this.registry.dropLapsed(subscriptionId);
      this.transition(subscriptionId, state, 'cancelled');
      return 'cancelled';
    }

    state = this.transition(subscriptionId, state, 'resubscribing');
    logger.warn(`Renewal of ${subscriptionId} failed (${renewError.message}); trying a fresh subscription`);

    try {
      // null: בוטל לפני החידוש, במהלכו או במהלך המנוי החדש
      const newId = await this.registry.resubscribe(subscriptionId);
      if (newId === null) {
        this.transition(subscriptionId, state, 'cancelled');
        return 'cancelled';
      }
      if (!this.running) {
        // הכיבוי התחיל בזמן המנוי החדש
        await this.registry.unsubscribe(newId);
        this.transition(subscriptionId, state, 'cancelled');
        return 'cancelled';
      }
      this.transition(subscriptionId, state, 'resubscribed');
      logger.info(`Subscription ${subscriptionId} replaced by ${newId}`);
      this.emit('resubscribed', subscriptionId, newId);
      return 'resubscribed';
    } catch (error: unknown) {
      const lostError = error instanceof Error ? error : new Error(String(error));
      this.transition(subscriptionId, state, 'lost');
      logger.error(`Subscription ${subscriptionId} to ${subscription.device.friendlyName || subscription.deviceUdn} is lost: ${errorMessage(error)}`);
      this.emit('lost', subscriptionId, lostError);
      if (subscription.onSubscriptionLost) {
        try {
          subscription.onSubscriptionLost(subscriptionId, lostError);
        } catch (callbackError: unknown) {
          logger.error(`onSubscriptionLost callback for ${subscriptionId} threw`, { error: callbackError });
        }
      }
      return 'lost';
    }
  }
}
