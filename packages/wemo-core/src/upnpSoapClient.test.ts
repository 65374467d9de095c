// src/upnpSoapClient.test.ts
import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockAxios = vi.hoisted(() => ({
  post: vi.fn(),
  isAxiosError: vi.fn(() => false),
}));

vi.mock('axios', () => ({
  default: mockAxios,
  ...mockAxios,
}));

import { ControlFault, MalformedResponse, TransportError } from './errors';
import { makeDevice, buildSoapFaultXml, buildSoapResponseXml } from './testFixtures';
import { BASIC_EVENT_SERVICE } from './types';
import {
  UNKNOWN_FAULT_CODE,
  buildSoapEnvelope,
  createControlCommand,
  parseSoapResponse,
  sendControlCommand,
} from './upnpSoapClient';

const device = makeDevice();

function respond(status: number, data: string): void {
  mockAxios.post.mockResolvedValueOnce({ status, data, headers: {} });
}

describe('createControlCommand', () => {
  it('ממיר ערכים למחרוזות ושומר על סדר הארגומנטים', () => {
    expect(createControlCommand('SetBinaryState', { BinaryState: 1, Duration: 'x', Force: true })).toEqual({
      serviceType: BASIC_EVENT_SERVICE,
      action: 'SetBinaryState',
      arguments: [
        { name: 'BinaryState', value: '1' },
        { name: 'Duration', value: 'x' },
        { name: 'Force', value: 'true' },
      ],
    });
  });
});

describe('buildSoapEnvelope', () => {
  it('בונה מעטפה עם אלמנט הפעולה ב-namespace של השירות', () => {
    const envelope = buildSoapEnvelope(createControlCommand('SetBinaryState', { BinaryState: 1 }));

    expect(envelope).toMatch(/<BinaryState[^>]*>1<\/BinaryState>/);
    expect(envelope).toContain(`xmlns:u="${BASIC_EVENT_SERVICE}"`);
    expect(envelope).toContain('s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/"');
  });

  it('מבצע escape לערכי הארגומנטים', () => {
    const envelope = buildSoapEnvelope(createControlCommand('ChangeFriendlyName', { FriendlyName: 'Tom & Jerry <3' }));
    expect(envelope).toContain('Tom &amp; Jerry &lt;3');
  });
});

describe('parseSoapResponse', () => {
  it('מחזיר ערך ריק לאלמנט ריק', async () => {
    const outcome = await parseSoapResponse(buildSoapResponseXml('GetFriendlyName', { FriendlyName: '' }), 'GetFriendlyName');
    expect(outcome).toEqual({ kind: 'result', values: { FriendlyName: '' } });
  });
});

describe('sendControlCommand', () => {
  beforeEach(() => {
    mockAxios.post.mockReset();
  });

  it('שולח POST עם כותרת SOAPAction ומחזיר את ערכי התשובה', async () => {
    respond(200, buildSoapResponseXml('GetBinaryState', { BinaryState: '1' }));

    const result = await sendControlCommand(device, createControlCommand('GetBinaryState'), { timeoutMs: 1234 });

    expect(result).toEqual({ BinaryState: '1' });
    expect(mockAxios.post).toHaveBeenCalledTimes(1);
    const [url, body, requestConfig] = mockAxios.post.mock.calls[0];
    expect(url).toBe('http://192.168.1.50:49153/upnp/control/basicevent1');
    expect(body).toContain('GetBinaryState');
    expect(requestConfig.timeout).toBe(1234);
    expect(requestConfig.headers.SOAPAction).toBe('"urn:Belkin:service:basicevent:1#GetBinaryState"');
    expect(requestConfig.headers['Content-Type']).toBe('text/xml; charset="utf-8"');
  });

  it('זורק ControlFault עם הקוד והתיאור של UPnPError', async () => {
    respond(500, buildSoapFaultXml('UPnPError', { code: '401', description: 'Invalid Action' }));

    const error = await sendControlCommand(device, createControlCommand('Bogus')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ControlFault);
    expect(error).toMatchObject({ code: 401, description: 'Invalid Action', message: 'Control fault 401: Invalid Action' });
  });

  it('משתמש ב-faultstring ובקוד -1 כשאין UPnPError', async () => {
    respond(500, buildSoapFaultXml('Error'));

    const error = await sendControlCommand(device, createControlCommand('SetBinaryState', { BinaryState: 1 })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ControlFault);
    expect(error).toMatchObject({ code: UNKNOWN_FAULT_CODE, description: 'Error' });
  });

  it('זורק TransportError עם הסטטוס כשהגוף אינו XML', async () => {
    respond(500, 'Internal Server Error');

    const error = await sendControlCommand(device, createControlCommand('GetBinaryState')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ statusCode: 500 });
  });

  it('זורק MalformedResponse על 200 בלי אלמנט התשובה', async () => {
    respond(200, buildSoapResponseXml('SomethingElse', { Value: '1' }));

    await expect(sendControlCommand(device, createControlCommand('GetBinaryState'))).rejects.toBeInstanceOf(MalformedResponse);
  });

  it('עוטף כשל רשת ב-TransportError', async () => {
    mockAxios.post.mockRejectedValueOnce(new Error('connect ECONNREFUSED 192.168.1.50:49153'));

    const error = await sendControlCommand(device, createControlCommand('GetBinaryState')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ statusCode: undefined });
    expect(String(error)).toContain('ECONNREFUSED');
  });
});
