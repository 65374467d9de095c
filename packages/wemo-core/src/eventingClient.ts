// שליחת בקשות GENA (SUBSCRIBE / UNSUBSCRIBE) לכתובת ה-eventSubURL של ההתקן
import axios from 'axios';
import type { AxiosResponse } from 'axios';

import { config } from './config';
import { TransportError, errorMessage } from './errors';
import { createModuleLogger } from './logger';
import type { EventingTransport, GrantedSubscription } from './types';

const logger = createModuleLogger('eventingClient');

const TIMEOUT_PATTERN = /^Second-(\d+|infinite)$/i;

/**
 * @hebrew מפענח כותרת TIMEOUT ("Second-1800"). ערך חסר, לא מוכר או infinite מחזיר את הזמן שהתבקש.
 */
export function parseTimeoutHeader(value: string | undefined, requestedSeconds: number): number {
  const match = value?.trim().match(TIMEOUT_PATTERN);
  if (!match || match[1].toLowerCase() === 'infinite') {
    return requestedSeconds;
  }
  const seconds = parseInt(match[1], 10);
  return seconds > 0 ? seconds : requestedSeconds;
}

function readHeader(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name.toLowerCase()];
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0].trim();
  return undefined;
}

export interface HttpEventingClientOptions {
  requestTimeoutMs?: number;
}

/**
 * @hebrew מימוש EventingTransport מעל axios. כל כשל נזרק כ-TransportError,
 * והמאגר עוטף אותו ב-SubscribeError או RenewError.
 */
export class HttpEventingClient implements EventingTransport {
  private readonly requestTimeoutMs: number;

  constructor(options: HttpEventingClientOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.eventing.requestTimeoutMs;
  }

  async subscribe(eventSubUrl: string, callbackUrl: string, requestedSeconds: number): Promise<GrantedSubscription> {
    const response = await this.send('SUBSCRIBE', eventSubUrl, {
      CALLBACK: `<${callbackUrl}>`,
      NT: 'upnp:event',
      TIMEOUT: `Second-${requestedSeconds}`,
    });
    const subscriptionId = readHeader(response, 'SID');
    if (!subscriptionId) {
      throw new TransportError(`SUBSCRIBE to ${eventSubUrl} succeeded without a SID header`, { statusCode: response.status });
    }
    const grantedSeconds = parseTimeoutHeader(readHeader(response, 'TIMEOUT'), requestedSeconds);
    logger.debug(`Subscribed at ${eventSubUrl}: ${subscriptionId} for ${grantedSeconds}s`);
    return { subscriptionId, grantedSeconds };
  }

  async renew(eventSubUrl: string, subscriptionId: string, requestedSeconds: number): Promise<GrantedSubscription> {
    const response = await this.send('SUBSCRIBE', eventSubUrl, {
      SID: subscriptionId,
      TIMEOUT: `Second-${requestedSeconds}`,
    });
    const grantedSeconds = parseTimeoutHeader(readHeader(response, 'TIMEOUT'), requestedSeconds);
    return { subscriptionId: readHeader(response, 'SID') || subscriptionId, grantedSeconds };
  }

  async unsubscribe(eventSubUrl: string, subscriptionId: string): Promise<void> {
    await this.send('UNSUBSCRIBE', eventSubUrl, { SID: subscriptionId });
  }

  private async send(method: string, url: string, headers: Record<string, string>): Promise<AxiosResponse> {
    let response: AxiosResponse;
    try {
      response = await axios.request({
        method,
        url,
        headers,
        timeout: this.requestTimeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      });
    } catch (error: unknown) {
      throw new TransportError(`${method} ${url} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(`${method} ${url} returned HTTP ${response.status}`, { statusCode: response.status });
    }
    return response;
  }
}
