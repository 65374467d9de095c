import { config } from './config';
import { CallbackListener } from './callbackListener';
import { SubscribeError } from './errors';
import { HttpEventingClient } from './eventingClient';
import { createModuleLogger } from './logger';
import { RenewalScheduler } from './renewalScheduler';
import { SubscriptionRegistry } from './subscriptionRegistry';
import type {
  CallbackListenerOptions,
  EventHandler,
  EventingTransport,
  RenewalSchedulerOptions,
  Subscription,
  SubscriptionLostHandler,
  WemoDevice,
} from './types';

const logger = createModuleLogger('WemoEventingSubsystem');

export interface WemoEventingSubsystemOptions {
  listener?: CallbackListenerOptions;
  renewal?: RenewalSchedulerOptions;
  /** משך המנוי שמתבקש כברירת מחדל, בשניות. */
  defaultDurationSeconds?: number;
  /** תעבורת GENA חלופית (בבדיקות). */
  eventing?: EventingTransport;
}

export interface EventSubscribeOptions {
  durationSeconds?: number;
  onSubscriptionLost?: SubscriptionLostHandler;
}

/**
 * @hebrew מחבר בין המאזין, הרישום והמתזמן. כל מופע מחזיק את המצב שלו בלבד,
 * כך שאפשר להריץ כמה מופעים באותו תהליך (למשל בבדיקות).
 */
export class WemoEventingSubsystem {
  readonly registry: SubscriptionRegistry;
  readonly scheduler: RenewalScheduler;
  readonly listener: CallbackListener;
  private readonly defaultDurationSeconds: number;

  constructor(options: WemoEventingSubsystemOptions = {}) {
    this.defaultDurationSeconds = options.defaultDurationSeconds ?? config.eventing.requestedDurationSeconds;
    // המאזין צריך את הרישום לצורך lookup והרישום צריך את המאזין כנתב
    this.listener = new CallbackListener(options.listener ?? {}, (id) => this.registry.lookup(id));
    this.registry = new SubscriptionRegistry({
      eventing: options.eventing ?? new HttpEventingClient(),
      router: this.listener,
    });
    this.scheduler = new RenewalScheduler(this.registry, options.renewal);
  }

  /**
   * @hebrew מפעיל את המאזין ואת מתזמן החידושים.
   * @returns כתובת הבסיס ל-callback.
   */
  async start(): Promise<string> {
    const baseUrl = await this.listener.start();
    this.scheduler.start();
    return baseUrl;
  }

  /**
   * @hebrew נרשם לאירועים של התקן. המאזין חייב לרוץ.
   * @returns ה-SID של המנוי. המזהה הזה ממשיך לשמש ל-renew ול-unsubscribe
   * גם אחרי שהמתזמן החליף את המנוי ב-SID חדש.
   */
  async subscribe(device: WemoDevice, handler: EventHandler, options: EventSubscribeOptions = {}): Promise<string> {
    if (!this.listener.isListening) {
      throw new SubscribeError('Callback listener is not started; call start() first');
    }
    return this.registry.subscribe(
      device,
      this.listener.callbackBaseUrl,
      options.durationSeconds ?? this.defaultDurationSeconds,
      handler,
      { onSubscriptionLost: options.onSubscriptionLost }
    );
  }

  renew(subscriptionId: string): Promise<number> {
    return this.registry.renew(subscriptionId);
  }

  unsubscribe(subscriptionId: string): Promise<void> {
    return this.registry.unsubscribe(subscriptionId);
  }

  subscriptions(): Subscription[] {
    return this.registry.list();
  }

  /**
   * @hebrew עוצר את המתזמן, מבטל את כל המנויים (best-effort) וסוגר את המאזין.
   */
  async shutdown(): Promise<void> {
    logger.info(`Shutting down eventing (${this.registry.size} active subscription(s))`);
    await this.scheduler.stop();
    await this.registry.unsubscribeAll();
    await this.listener.stop();
  }
}
