// היררכיית השגיאות של הספרייה. כל שגיאה נושאת את ה-cause המקורי כשיש כזה.

export class WemoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * @hebrew כשל רשת: חיבור, DNS, פסק זמן או סטטוס HTTP שאינו 2xx (ללא SOAP Fault).
 */
export class TransportError extends WemoError {
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options);
    this.statusCode = options?.statusCode;
  }
}

/**
 * @hebrew מסמך תיאור התקן לא תקין או חסרים בו UDN, controlURL או eventSubURL.
 */
export class MalformedDescription extends WemoError {
  readonly location: string;

  constructor(location: string, message: string, options?: { cause?: unknown }) {
    super(`Malformed device description at ${location}: ${message}`, options);
    this.location = location;
  }
}

/** גוף NOTIFY שאינו propertyset תקין. */
export class MalformedEvent extends WemoError {}

/** תשובת 2xx ממשק הבקרה שאין בה את אלמנט ה-Response הצפוי. */
export class MalformedResponse extends WemoError {}

/**
 * @hebrew SOAP Fault שההתקן החזיר. code הוא ה-errorCode של UPnPError, או -1 כשאין כזה.
 */
export class ControlFault extends WemoError {
  readonly code: number;
  readonly description: string;

  constructor(code: number, description: string) {
    super(`Control fault ${code}: ${description}`);
    this.code = code;
    this.description = description;
  }
}

export class SubscribeError extends WemoError {
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options);
    this.statusCode = options?.statusCode;
  }
}

export class RenewError extends WemoError {
  readonly subscriptionId: string;

  constructor(subscriptionId: string, message: string, options?: { cause?: unknown }) {
    super(`Renewal of ${subscriptionId} failed: ${message}`, options);
    this.subscriptionId = subscriptionId;
  }
}

export class NotFoundError extends WemoError {
  readonly subscriptionId: string;

  constructor(subscriptionId: string) {
    super(`No subscription with id ${subscriptionId}`);
    this.subscriptionId = subscriptionId;
  }
}

/**
 * @hebrew מחלץ הודעה קריאה מכל ערך שנזרק.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
