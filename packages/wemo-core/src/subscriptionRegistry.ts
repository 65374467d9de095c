// קובץ: packages/wemo-core/src/subscriptionRegistry.ts

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';

import { NotFoundError, RenewError, SubscribeError, TransportError, errorMessage } from './errors';
import { createModuleLogger } from './logger';
import type {
  CallbackRouter,
  EventHandler,
  EventingTransport,
  GrantedSubscription,
  SubscribeOptions,
  Subscription,
  WemoDevice,
} from './types';

const logger = createModuleLogger('SubscriptionRegistry');

export type RemovalReason = 'unsubscribed' | 'renew-failed';

export interface SubscriptionRegistryOptions {
  eventing: EventingTransport;
  router: CallbackRouter;
  /** מחולל מקטעי נתיב ל-callback. ברירת מחדל: UUID אקראי. */
  generateCallbackPath?: () => string;
}

export interface RenewOptions {
  /**
   * @hebrew בכשל, לשמור את המנוי כממתין להחלפה עד ל-resubscribe או dropLapsed.
   */
  holdForResubscribe?: boolean;
}

interface PendingReplacement {
  previous: Subscription;
  cancelled: boolean;
}

export interface SubscriptionRegistryEvents {
  subscribed: [subscription: Subscription];
  renewed: [subscription: Subscription];
  removed: [subscription: Subscription, reason: RemovalReason];
}

function joinCallbackUrl(callbackBaseUrl: string, callbackPath: string): string {
  return `${callbackBaseUrl.replace(/\/+$/, '')}/${callbackPath}`;
}

/**
 * @internal
 * הרישום הסמכותי של מנויי GENA פעילים.
 *
 * כל שינוי הוא החלפה סינכרונית של רשומה מוקפאת במפה אחת, שמתבצעת רק אחרי
 * שה-I/O הסתיים ורק אם הרשומה במפה היא עדיין אותה רשומה שהפעולה התחילה ממנה.
 * כך קוראים (המאזין, המתזמן) לא רואים רשומה חצי מעודכנת, וחידוש שמסתיים אחרי
 * ביטול לא מחזיר את המנוי לחיים.
 *
 * מנוי שהוחלף ב-SID חדש (resubscribe) נשאר נגיש למתקשר דרך המזהה המקורי:
 * unsubscribe ו-renew מתרגמים כל מזהה קודם ל-SID הנוכחי.
 *
 * אירועים: 'subscribed', 'renewed', 'removed' (subscription, reason).
 */
export class SubscriptionRegistry extends EventEmitter<SubscriptionRegistryEvents> {
  private readonly subscriptions = new Map<string, Subscription>();
  // מזהה קודם -> SID נוכחי, תמיד בקפיצה אחת
  private readonly aliases = new Map<string, string>();
  // SID שהחידוש שלו נכשל וממתין למנוי חלופי
  private readonly lapsed = new Map<string, PendingReplacement>();
  private readonly eventing: EventingTransport;
  private readonly router: CallbackRouter;
  private readonly generateCallbackPath: () => string;

  constructor(options: SubscriptionRegistryOptions) {
    super();
    this.eventing = options.eventing;
    this.router = options.router;
    this.generateCallbackPath = options.generateCallbackPath ?? randomUUID;
  }

  /**
   * @hebrew שולח SUBSCRIBE ושומר את המנוי תחת ה-SID שההתקן החזיר.
   * מנויים כפולים לאותו התקן מותרים; כל אחד מקבל נתיב callback משלו.
   * @throws SubscribeError אם ההתקן דחה או לא ענה. במקרה כזה לא נשאר שום מצב.
   */
  async subscribe(
    device: WemoDevice,
    callbackBaseUrl: string,
    requestedSeconds: number,
    handler: EventHandler,
    options: SubscribeOptions = {}
  ): Promise<string> {
    const callbackPath = this.generateCallbackPath();
    const callbackUrl = joinCallbackUrl(callbackBaseUrl, callbackPath);

    let granted: GrantedSubscription;
    try {
      granted = await this.eventing.subscribe(device.eventSubUrl, callbackUrl, requestedSeconds);
    } catch (error: unknown) {
      const statusCode = error instanceof TransportError ? error.statusCode : undefined;
      logger.warn(`SUBSCRIBE to ${device.friendlyName || device.udn} failed: ${errorMessage(error)}`);
      throw new SubscribeError(`Subscribe to ${device.eventSubUrl} failed: ${errorMessage(error)}`, { cause: error, statusCode });
    }

    if (this.subscriptions.has(granted.subscriptionId)) {
      // SID שכבר קיים אצלנו: הרשומה הקודמת כבר לא בתוקף מבחינת ההתקן
      logger.warn(`Device reissued SID ${granted.subscriptionId}; replacing the previous subscription`);
      this.removeLocal(granted.subscriptionId, 'unsubscribed');
    }

    const grantedAt = Date.now();
    const subscription: Subscription = Object.freeze({
      id: granted.subscriptionId,
      device,
      deviceUdn: device.udn,
      callbackPath,
      callbackBaseUrl,
      requestedSeconds,
      grantedSeconds: granted.grantedSeconds,
      grantedAt,
      expiresAt: grantedAt + granted.grantedSeconds * 1000,
      handler,
      onSubscriptionLost: options.onSubscriptionLost,
    });

    this.subscriptions.set(subscription.id, subscription);
    this.router.addRoute(callbackPath, subscription.id);
    logger.info(`Subscribed to ${device.friendlyName || device.udn} as ${subscription.id} for ${granted.grantedSeconds}s`);
    this.emit('subscribed', subscription);
    return subscription.id;
  }

  /**
   * @hebrew מחדש מנוי קיים עם אותו SID ואותו זמן שהתבקש במקור.
   * @returns זמן התפוגה החדש (ms epoch).
   * @throws RenewError אם המזהה לא ידוע (בלי פנייה לרשת) או שהחידוש נכשל.
   * בכשל הרשומה המקומית נמחקת.
   */
  async renew(id: string, options: RenewOptions = {}): Promise<number> {
    const subscriptionId = this.currentId(id);
    const current = this.subscriptions.get(subscriptionId);
    if (!current) {
      throw new RenewError(subscriptionId, 'unknown subscription id');
    }

    let granted: GrantedSubscription;
    try {
      granted = await this.eventing.renew(current.device.eventSubUrl, subscriptionId, current.requestedSeconds);
    } catch (error: unknown) {
      logger.warn(`Renewal of ${subscriptionId} failed: ${errorMessage(error)}`);
      if (this.subscriptions.get(subscriptionId) === current) {
        if (options.holdForResubscribe) {
          this.lapsed.set(subscriptionId, { previous: current, cancelled: false });
        } else {
          this.forgetAliases(subscriptionId);
        }
        this.removeLocal(subscriptionId, 'renew-failed');
      }
      throw new RenewError(subscriptionId, errorMessage(error), { cause: error });
    }

    if (this.subscriptions.get(subscriptionId) !== current) {
      throw new RenewError(subscriptionId, 'subscription was removed while the renewal was in flight');
    }

    const grantedAt = Date.now();
    const renewed: Subscription = Object.freeze({
      ...current,
      grantedSeconds: granted.grantedSeconds,
      grantedAt,
      expiresAt: grantedAt + granted.grantedSeconds * 1000,
    });
    this.subscriptions.set(subscriptionId, renewed);
    logger.debug(`Renewed ${subscriptionId} for ${granted.grantedSeconds}s`);
    this.emit('renewed', renewed);
    return renewed.expiresAt;
  }

  /**
   * @hebrew מחליף מנוי שהחידוש שלו נכשל (renew עם holdForResubscribe) במנוי חדש
   * לאותו התקן, עם אותו handler ואותו משך. המזהה הקודם ממשיך לפנות למנוי החדש.
   * @returns ה-SID החדש, או null אם המנוי בוטל לפני או במהלך ההחלפה.
   * @throws SubscribeError אם ההתקן דחה את המנוי החדש. המזהה הקודם נשכח.
   */
  async resubscribe(previousId: string): Promise<string | null> {
    const pending = this.lapsed.get(previousId);
    if (!pending || pending.cancelled) {
      this.lapsed.delete(previousId);
      return null;
    }

    const { previous } = pending;
    let newId: string;
    try {
      newId = await this.subscribe(
        previous.device,
        previous.callbackBaseUrl,
        previous.requestedSeconds,
        previous.handler,
        { onSubscriptionLost: previous.onSubscriptionLost }
      );
    } catch (error: unknown) {
      this.forgetAliases(previousId);
      throw error;
    } finally {
      this.lapsed.delete(previousId);
    }

    if (pending.cancelled) {
      logger.info(`Subscription ${previousId} was cancelled while being replaced; dropping ${newId}`);
      this.forgetAliases(previousId);
      await this.unsubscribe(newId);
      return null;
    }

    for (const [alias, target] of this.aliases) {
      if (target === previousId) this.aliases.set(alias, newId);
    }
    this.aliases.set(previousId, newId);
    return newId;
  }

  /**
   * @hebrew משחרר מנוי שממתין להחלפה בלי לנסות מנוי חדש (למשל בעצירת המתזמן).
   */
  dropLapsed(previousId: string): void {
    if (this.lapsed.delete(previousId)) {
      this.forgetAliases(previousId);
    }
  }

  /** האם המנוי ממתין להחלפה ולא בוטל. */
  isLapsed(subscriptionId: string): boolean {
    return this.lapsed.get(subscriptionId)?.cancelled === false;
  }

  /** ה-SID הנוכחי של מזהה שהמתקשר קיבל, אחרי החלפות. */
  currentId(id: string): string {
    return this.aliases.get(id) ?? id;
  }

  /**
   * @hebrew מסיר את המנוי מיד ואז שולח UNSUBSCRIBE להתקן. כשל בצד ההתקן נרשם בלבד.
   * מקבל גם מזהה קודם של מנוי שהוחלף. מנוי שנמצא באמצע החלפה מסומן כמבוטל,
   * והמנוי החדש יבוטל ברגע שיתקבל. מזהה לא ידוע הוא no-op.
   */
  async unsubscribe(id: string): Promise<void> {
    const subscriptionId = this.currentId(id);
    this.forgetAliases(subscriptionId);

    const pending = this.lapsed.get(subscriptionId);
    if (pending) {
      pending.cancelled = true;
      logger.info(`Unsubscribe of ${subscriptionId} while it is being replaced; the replacement will be dropped`);
      return;
    }

    const removed = this.removeLocal(subscriptionId, 'unsubscribed');
    if (!removed) {
      logger.debug(`Unsubscribe of unknown id ${id} ignored`);
      return;
    }

    try {
      await this.eventing.unsubscribe(removed.device.eventSubUrl, subscriptionId);
      logger.info(`Unsubscribed ${subscriptionId}`);
    } catch (error: unknown) {
      logger.warn(`UNSUBSCRIBE for ${subscriptionId} was not acknowledged by the device: ${errorMessage(error)}`);
    }
  }

  /**
   * @throws NotFoundError אם אין מנוי כזה.
   */
  lookup(subscriptionId: string): EventHandler {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      throw new NotFoundError(subscriptionId);
    }
    return subscription.handler;
  }

  has(subscriptionId: string): boolean {
    return this.subscriptions.has(subscriptionId);
  }

  describe(subscriptionId: string): Subscription | undefined {
    return this.subscriptions.get(subscriptionId);
  }

  list(): Subscription[] {
    return [...this.subscriptions.values()];
  }

  get size(): number {
    return this.subscriptions.size;
  }

  /**
   * @hebrew מבטל את כל המנויים (best-effort), למשל בעת כיבוי.
   */
  async unsubscribeAll(): Promise<void> {
    for (const pending of this.lapsed.values()) {
      pending.cancelled = true;
    }
    const ids = [...this.subscriptions.keys()];
    await Promise.all(ids.map(id => this.unsubscribe(id)));
  }

  private forgetAliases(subscriptionId: string): void {
    this.aliases.delete(subscriptionId);
    for (const [alias, target] of this.aliases) {
      if (target === subscriptionId) this.aliases.delete(alias);
    }
  }

  private removeLocal(subscriptionId: string, reason: RemovalReason): Subscription | undefined {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return undefined;
    }
    this.subscriptions.delete(subscriptionId);
    this.router.removeRoute(subscription.callbackPath);
    this.emit('removed', subscription, reason);
    return subscription;
  }
}
