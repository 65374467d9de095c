// שרת ה-HTTP המקומי שמקבל NOTIFY מההתקנים ומעביר אותם ל-handler של המנוי
import * as http from 'node:http';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';

import { config } from './config';
import { MalformedEvent, NotFoundError, errorMessage } from './errors';
import { parseEventBody } from './eventParser';
import { createModuleLogger } from './logger';
import { resolveAdvertiseAddress } from './networkUtils';
import type { CallbackListenerOptions, CallbackRouter, EventHandler, WemoEvent } from './types';

const logger = createModuleLogger('callbackListener');

const MAX_EVENT_BODY = '512kb';

export type HandlerLookup = (subscriptionId: string) => EventHandler;

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

function formatHost(address: string): string {
  return address.includes(':') ? `[${address}]` : address;
}

function statusOf(err: Error): number {
  const status: unknown = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

/**
 * @hebrew מאזין ה-callback של GENA. נתיב לכל מנוי: <prefix>/<callbackPath>.
 *
 * - שיטה שאינה NOTIFY: 405
 * - נתיב לא מוכר או מנוי שכבר לא קיים ברישום: 404
 * - גוף שאינו propertyset תקין: 400
 * - אחרת 200 מיד, וה-handler רץ אחרי שהתשובה נשלחה. שגיאות שלו נרשמות ולא משפיעות על התשובה.
 */
export class CallbackListener implements CallbackRouter {
  private readonly routes = new Map<string, string>();
  private readonly app: Express;
  private readonly lookup: HandlerLookup;
  private readonly bindAddress: string;
  private readonly bindPort: number;
  private readonly pathPrefix: string;
  private readonly advertiseAddress: string;
  private readonly handlerWarnMs: number;
  private server: http.Server | null = null;
  private baseUrl: string | null = null;

  constructor(options: CallbackListenerOptions, lookup: HandlerLookup) {
    this.lookup = lookup;
    this.bindAddress = options.bindAddress ?? config.listener.bindAddress;
    this.bindPort = options.bindPort ?? config.listener.bindPort;
    this.pathPrefix = normalizePrefix(options.pathPrefix ?? config.listener.pathPrefix);
    this.advertiseAddress = options.advertiseAddress ?? config.listener.advertiseAddress;
    this.handlerWarnMs = options.handlerWarnMs ?? config.listener.handlerWarnMs;
    this.app = this.createApp();
  }

  addRoute(callbackPath: string, subscriptionId: string): void {
    this.routes.set(callbackPath, subscriptionId);
  }

  removeRoute(callbackPath: string): void {
    this.routes.delete(callbackPath);
  }

  /** כתובת הבסיס שמפורסמת ב-CALLBACK. זמינה רק אחרי start(). */
  get callbackBaseUrl(): string {
    if (!this.baseUrl) {
      throw new Error('Callback listener is not started');
    }
    return this.baseUrl;
  }

  get isListening(): boolean {
    return this.server !== null;
  }

  private createApp(): Express {
    const app = express();
    app.disable('x-powered-by');

    app.all(
      `${this.pathPrefix}/:callbackId`,
      express.text({ type: () => true, limit: MAX_EVENT_BODY }),
      (req: Request, res: Response) => this.handleNotify(req, res)
    );

    app.use((req: Request, res: Response) => {
      logger.debug(`No callback route for ${req.method} ${req.originalUrl}`);
      res.status(404).end();
    });

    // Error handling middleware - חייב להיות האחרון
    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      const status = statusOf(err);
      logger.warn(`Rejected ${req.method} ${req.originalUrl} with ${status}: ${err.message}`);
      res.status(status).end();
    });

    return app;
  }

  private async handleNotify(req: Request, res: Response): Promise<void> {
    const callbackId = req.params.callbackId;

    if (req.method !== 'NOTIFY') {
      res.status(405).set('Allow', 'NOTIFY').end();
      return;
    }

    const subscriptionId = this.routes.get(callbackId);
    if (!subscriptionId) {
      logger.debug(`NOTIFY for unknown callback path ${callbackId}`);
      res.status(404).end();
      return;
    }

    let handler: EventHandler;
    try {
      handler = this.lookup(subscriptionId);
    } catch (error: unknown) {
      if (!(error instanceof NotFoundError)) throw error;
      logger.debug(`NOTIFY for ${subscriptionId} which is no longer registered`);
      res.status(404).end();
      return;
    }

    const sidHeader = req.get('SID');
    if (sidHeader && sidHeader !== subscriptionId) {
      logger.debug(`NOTIFY on ${callbackId} carries SID ${sidHeader}, routed to ${subscriptionId} by path`);
    }

    let properties: Record<string, string>;
    try {
      properties = await parseEventBody(typeof req.body === 'string' ? req.body : '');
    } catch (error: unknown) {
      if (!(error instanceof MalformedEvent)) throw error;
      logger.warn(`Malformed NOTIFY body for ${subscriptionId}: ${error.message}`);
      res.status(400).end();
      return;
    }

    res.status(200).end();
    logger.debug(`Event for ${subscriptionId} (SEQ ${req.get('SEQ') ?? '?'})`, { properties });
    this.dispatch(handler, { subscriptionId, properties });
  }

  private dispatch(handler: EventHandler, event: WemoEvent): void {
    setImmediate(() => {
      const warnTimer = setTimeout(() => {
        logger.warn(`Handler for ${event.subscriptionId} has not finished after ${this.handlerWarnMs}ms`);
      }, this.handlerWarnMs);
      warnTimer.unref();

      void Promise.resolve()
        .then(() => handler(event))
        .catch((error: unknown) => {
          logger.error(`Event handler for ${event.subscriptionId} failed: ${errorMessage(error)}`, { error });
        })
        .finally(() => clearTimeout(warnTimer));
    });
  }

  /**
   * @hebrew מתחיל להאזין ומחזיר את כתובת הבסיס ל-callback (http://<address>:<port><prefix>).
   */
  async start(): Promise<string> {
    if (this.server) {
      return this.callbackBaseUrl;
    }

    const server = http.createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.bindPort, this.bindAddress, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (error) => logger.error('Callback listener server error', { error }));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      server.close();
      throw new Error(`Callback listener bound to an unexpected address: ${String(address)}`);
    }
    const port = address.port;
    const host = resolveAdvertiseAddress(this.bindAddress, this.advertiseAddress);
    this.server = server;
    this.baseUrl = `http://${formatHost(host)}:${port}${this.pathPrefix}`;
    logger.info(`Callback listener on ${this.bindAddress}:${port}, advertising ${this.baseUrl}`);
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    this.baseUrl = null;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Callback listener stopped');
  }
}
