// קובץ זה מכיל את הגדרות הטיפוסים המשותפות לגילוי, בקרה ואירועים של התקני WeMo

export const BASIC_EVENT_SERVICE = 'urn:Belkin:service:basicevent:1';
export const WEMO_SEARCH_TARGET = BASIC_EVENT_SERVICE;

/** הפורטים שהתקני WeMo מאזינים עליהם; הפורט משתנה לאחר אתחול ההתקן. */
export const WEMO_PORTS: readonly number[] = [49153, 49152, 49154, 49155];

/**
 * @hebrew התקן שאותר ופוענח ממסמך התיאור שלו. האובייקט מוקפא ואינו מחזיק הפניה לגילוי.
 */
export interface WemoDevice {
  /** מזהה ייחודי ויציב בין סבבי גילוי (uuid:...). */
  readonly udn: string;
  readonly friendlyName: string;
  /** כתובת מסמך התיאור (LOCATION). */
  readonly location: string;
  /** scheme://host:port */
  readonly baseUrl: string;
  readonly controlUrl: string;
  readonly eventSubUrl: string;
  /** סוג השירות ש-controlUrl ו-eventSubUrl שייכים אליו. */
  readonly serviceType: string;
  readonly deviceType: string;
  readonly manufacturer?: string;
  readonly modelName?: string;
  readonly serialNumber?: string;
  readonly host: string;
  readonly port: number;
}

export interface ControlArgument {
  readonly name: string;
  readonly value: string;
}

export interface ControlCommand {
  readonly serviceType: string;
  readonly action: string;
  readonly arguments: readonly ControlArgument[];
}

/** שמות ארגומנטים -> ערכים, כפי שחזרו ב-<ActionResponse>. */
export type ControlResult = Record<string, string>;

export interface ControlOptions {
  timeoutMs?: number;
}

export interface WemoEvent {
  readonly subscriptionId: string;
  readonly properties: Readonly<Record<string, string>>;
}

export type EventHandler = (event: WemoEvent) => void | Promise<void>;

export type SubscriptionLostHandler = (subscriptionId: string, error: Error) => void;

/**
 * @hebrew תמונת מצב (מוקפאת) של מנוי. הרשומה הסמכותית נשמרת ברישום בלבד.
 */
export interface Subscription {
  /** ה-SID שההתקן הקצה. */
  readonly id: string;
  readonly device: WemoDevice;
  readonly deviceUdn: string;
  /** מקטע הנתיב הייחודי תחת תחילית המאזין. */
  readonly callbackPath: string;
  readonly callbackBaseUrl: string;
  readonly requestedSeconds: number;
  readonly grantedSeconds: number;
  /** זמן (ms epoch) שבו ההתקן אישר את המנוי או את החידוש האחרון. */
  readonly grantedAt: number;
  readonly expiresAt: number;
  readonly handler: EventHandler;
  readonly onSubscriptionLost?: SubscriptionLostHandler;
}

export interface SubscribeOptions {
  onSubscriptionLost?: SubscriptionLostHandler;
}

export interface GrantedSubscription {
  readonly subscriptionId: string;
  readonly grantedSeconds: number;
}

/**
 * @hebrew שכבת התעבורה של GENA (SUBSCRIBE / UNSUBSCRIBE). הרישום תלוי בממשק זה בלבד.
 */
export interface EventingTransport {
  subscribe(eventSubUrl: string, callbackUrl: string, requestedSeconds: number): Promise<GrantedSubscription>;
  renew(eventSubUrl: string, subscriptionId: string, requestedSeconds: number): Promise<GrantedSubscription>;
  unsubscribe(eventSubUrl: string, subscriptionId: string): Promise<void>;
}

/** מיפוי מקטע נתיב -> מזהה מנוי, שהמאזין משתמש בו לניתוב NOTIFY. */
export interface CallbackRouter {
  addRoute(callbackPath: string, subscriptionId: string): void;
  removeRoute(callbackPath: string): void;
}

export interface DiscoveryOptions {
  timeoutMs?: number;
  searchTarget?: string;
  /** כתובת מקומית לקשירת סוקט ה-UDP. */
  bindAddress?: string;
}

export interface CallbackListenerOptions {
  bindAddress?: string;
  /** 0 = פורט זמני שמערכת ההפעלה בוחרת. */
  bindPort?: number;
  pathPrefix?: string;
  /** הכתובת שתפורסם להתקנים ב-CALLBACK. */
  advertiseAddress?: string;
  /** אחרי כמה ms מדווחים על handler שעדיין לא הסתיים. */
  handlerWarnMs?: number;
}

export interface RenewalSchedulerOptions {
  /** החלק מתוך זמן המנוי שאחריו מחדשים (ברירת מחדל 2/3). */
  renewFraction?: number;
}

export enum WemoBinaryState {
  Off = 0,
  On = 1,
  /** Insight: דלוק אך ללא צריכה. */
  OnWithoutLoad = 8,
}
