// src/callbackListener.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import { CallbackListener } from './callbackListener';
import { NotFoundError } from './errors';
import { buildPropertySetXml } from './testFixtures';
import type { EventHandler } from './types';

describe('CallbackListener', () => {
  const handlers = new Map<string, EventHandler>();
  let listener: CallbackListener;
  let baseUrl: string;

  function notify(path: string, body: string, headers: Record<string, string> = {}) {
    return axios.request({
      method: 'NOTIFY',
      url: `${baseUrl}/${path}`,
      data: body,
      headers: { 'Content-Type': 'text/xml; charset="utf-8"', NT: 'upnp:event', NTS: 'upnp:propchange', SEQ: '0', ...headers },
      validateStatus: () => true,
    });
  }

  beforeEach(async () => {
    handlers.clear();
    listener = new CallbackListener(
      { bindAddress: '127.0.0.1', bindPort: 0, pathPrefix: '/wemo/events/', advertiseAddress: '127.0.0.1', handlerWarnMs: 1000 },
      (subscriptionId) => {
        const handler = handlers.get(subscriptionId);
        if (!handler) throw new NotFoundError(subscriptionId);
        return handler;
      }
    );
    baseUrl = await listener.start();
  });

  afterEach(async () => {
    await listener.stop();
  });

  it('מפרסם כתובת בסיס עם הכתובת, הפורט והתחילית', () => {
    expect(baseUrl).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/wemo\/events$/);
    expect(listener.callbackBaseUrl).toBe(baseUrl);
    expect(listener.isListening).toBe(true);
  });

  it('עונה 200 ומעביר את האירוע ל-handler של המנוי לפי הנתיב', async () => {
    const handler = vi.fn();
    handlers.set('uuid:sub-1', handler);
    listener.addRoute('cb-1', 'uuid:sub-1');

    const response = await notify('cb-1', buildPropertySetXml({ BinaryState: '1' }), { SID: 'uuid:sub-1' });

    expect(response.status).toBe(200);
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
    expect(handler).toHaveBeenCalledWith({ subscriptionId: 'uuid:sub-1', properties: { BinaryState: '1' } });
  });

  it('עונה 404 לנתיב שלא נרשם', async () => {
    const response = await notify('cb-unknown', buildPropertySetXml({ BinaryState: '1' }));
    expect(response.status).toBe(404);
  });

  it('עונה 404 כשהמנוי כבר לא קיים ברישום', async () => {
    listener.addRoute('cb-2', 'uuid:sub-gone');

    const response = await notify('cb-2', buildPropertySetXml({ BinaryState: '0' }));

    expect(response.status).toBe(404);
  });

  it('עונה 404 אחרי שהנתיב הוסר', async () => {
    const handler = vi.fn();
    handlers.set('uuid:sub-1', handler);
    listener.addRoute('cb-1', 'uuid:sub-1');
    listener.removeRoute('cb-1');

    const response = await notify('cb-1', buildPropertySetXml({ BinaryState: '1' }));

    expect(response.status).toBe(404);
    expect(handler).not.toHaveBeenCalled();
  });

  it('עונה 400 לגוף שאינו propertyset', async () => {
    const handler = vi.fn();
    handlers.set('uuid:sub-1', handler);
    listener.addRoute('cb-1', 'uuid:sub-1');

    const response = await notify('cb-1', '<not-a-propertyset/>');

    expect(response.status).toBe(400);
    expect(handler).not.toHaveBeenCalled();
  });

  it('עונה 405 לשיטה שאינה NOTIFY', async () => {
    listener.addRoute('cb-1', 'uuid:sub-1');

    const response = await axios.get(`${baseUrl}/cb-1`, { validateStatus: () => true });

    expect(response.status).toBe(405);
    expect(response.headers['allow']).toBe('NOTIFY');
  });

  it('עונה 404 לנתיב מחוץ לתחילית', async () => {
    const response = await axios.request({ method: 'NOTIFY', url: baseUrl.replace('/wemo/events', '/other/cb-1'), validateStatus: () => true });
    expect(response.status).toBe(404);
  });

  it('handler שזורק לא משפיע על התשובה או על אירועים הבאים', async () => {
    const failing = vi.fn(() => {
      throw new Error('handler exploded');
    });
    handlers.set('uuid:sub-1', failing);
    listener.addRoute('cb-1', 'uuid:sub-1');

    const first = await notify('cb-1', buildPropertySetXml({ BinaryState: '1' }));
    const second = await notify('cb-1', buildPropertySetXml({ BinaryState: '0' }));

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    await vi.waitFor(() => expect(failing).toHaveBeenCalledTimes(2));
  });

  it('stop סוגר את השרת ומנקה את כתובת הבסיס', async () => {
    await listener.stop();

    expect(listener.isListening).toBe(false);
    expect(() => listener.callbackBaseUrl).toThrow('Callback listener is not started');
  });
});
