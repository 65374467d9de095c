// קובץ זה מכיל לוגיקה לשליחת פקודות SOAP להתקני WeMo ולפענוח התשובות.
import axios from 'axios';
import { create } from 'xmlbuilder2';

import { config } from './config';
import { ControlFault, MalformedResponse, TransportError, errorMessage } from './errors';
import { createModuleLogger } from './logger';
import { BASIC_EVENT_SERVICE } from './types';
import type { ControlArgument, ControlCommand, ControlOptions, ControlResult, WemoDevice } from './types';
import { childNode, childText, createXmlParser, isXmlNode, textValue } from './xmlUtils';

const moduleLogger = createModuleLogger('upnpSoapClient');

const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const SOAP_ENC_NS = 'http://schemas.xmlsoap.org/soap/encoding/';
const USER_AGENT = 'Node.js/UPnP/1.0 wemo.js/0.1';

/** errorCode כשה-Fault לא כולל UPnPError. */
export const UNKNOWN_FAULT_CODE = -1;

export type SoapOutcome =
  | { kind: 'result'; values: ControlResult }
  | { kind: 'fault'; fault: ControlFault }
  | { kind: 'missing-response' };

/**
 * @hebrew יוצר ControlCommand. סדר הארגומנטים נשמר לפי סדר המפתחות באובייקט.
 */
export function createControlCommand(
  action: string,
  args: Record<string, string | number | boolean> = {},
  serviceType: string = BASIC_EVENT_SERVICE
): ControlCommand {
  const argumentList: ControlArgument[] = Object.entries(args).map(([name, value]) => ({ name, value: String(value) }));
  return { serviceType, action, arguments: argumentList };
}

/**
 * @hebrew בונה מעטפת SOAP 1.1 עם xmlbuilder2. ערכי הארגומנטים עוברים escape על ידי הספרייה.
 */
export function buildSoapEnvelope(command: ControlCommand): string {
  const doc = create({ version: '1.0', encoding: 'utf-8' });
  const actionElement = doc
    .ele(SOAP_ENV_NS, 's:Envelope')
    .att(SOAP_ENV_NS, 's:encodingStyle', SOAP_ENC_NS)
    .ele(SOAP_ENV_NS, 's:Body')
    .ele(command.serviceType, `u:${command.action}`);

  for (const arg of command.arguments) {
    actionElement.ele(arg.name).txt(arg.value);
  }
  return doc.end({ prettyPrint: false });
}

function readFault(fault: unknown): ControlFault {
  const upnpError = childNode(childNode(fault, 'detail'), 'UPnPError');
  const rawCode = childText(upnpError, 'errorCode');
  const parsedCode = rawCode === undefined ? NaN : parseInt(rawCode, 10);
  const description = childText(upnpError, 'errorDescription')
    ?? childText(fault, 'faultstring')
    ?? 'Unknown SOAP fault';
  return new ControlFault(Number.isNaN(parsedCode) ? UNKNOWN_FAULT_CODE : parsedCode, description);
}

/**
 * @hebrew מפענח גוף תשובת SOAP. ערכי התוצאה הם תמיד מחרוזות; אלמנט ריק הופך ל-''.
 * @throws שגיאת xml2js אם ה-XML לא תקין.
 */
export async function parseSoapResponse(xml: string, action: string): Promise<SoapOutcome> {
  const envelope: unknown = await createXmlParser().parseStringPromise(xml);
  const body = childNode(envelope, 'Body');
  if (!body) {
    return { kind: 'missing-response' };
  }

  if (body.Fault !== undefined) {
    return { kind: 'fault', fault: readFault(body.Fault) };
  }

  const responseKey = `${action}Response`;
  const responseNode = body[responseKey];
  if (responseNode === undefined) {
    return { kind: 'missing-response' };
  }

  const values: ControlResult = {};
  if (isXmlNode(responseNode)) {
    for (const [name, value] of Object.entries(responseNode)) {
      if (name === '$') continue;
      const first = Array.isArray(value) ? value[0] : value;
      values[name] = textValue(first) ?? '';
    }
  }
  return { kind: 'result', values };
}

/**
 * @hebrew שולח פקודת בקרה ל-controlUrl של ההתקן. אין ניסיון חוזר אוטומטי.
 * @returns מפת הארגומנטים שחזרו ב-<ActionResponse>.
 * @throws ControlFault אם ההתקן החזיר SOAP Fault.
 * @throws TransportError על כשל חיבור, DNS, פסק זמן או סטטוס שאינו 2xx בלי Fault.
 * @throws MalformedResponse על תשובת 2xx בלי אלמנט ה-Response הצפוי.
 */
export async function sendControlCommand(
  device: WemoDevice,
  command: ControlCommand,
  options: ControlOptions = {}
): Promise<ControlResult> {
  const timeoutMs = options.timeoutMs ?? config.control.timeoutMs;
  const envelope = buildSoapEnvelope(command);
  moduleLogger.debug(`Sending ${command.action} to ${device.controlUrl}`);
  moduleLogger.trace('SOAP envelope', { envelope });

  let status: number;
  let data: string;
  try {
    const response = await axios.post<string>(device.controlUrl, envelope, {
      headers: {
        'Content-Type': 'text/xml; charset="utf-8"',
        'SOAPAction': `"${command.serviceType}#${command.action}"`,
        'Connection': 'close',
        'User-Agent': USER_AGENT,
      },
      responseType: 'text',
      timeout: timeoutMs,
      validateStatus: () => true,
    });
    status = response.status;
    data = typeof response.data === 'string' ? response.data : String(response.data);
  } catch (error: unknown) {
    moduleLogger.warn(`${command.action} to ${device.controlUrl} failed: ${errorMessage(error)}`);
    throw new TransportError(`Control request ${command.action} to ${device.controlUrl} failed: ${errorMessage(error)}`, { cause: error });
  }

  const isSuccess = status >= 200 && status < 300;
  let outcome: SoapOutcome;
  try {
    outcome = await parseSoapResponse(data, command.action);
  } catch (error: unknown) {
    if (!isSuccess) {
      throw new TransportError(`Control request ${command.action} returned HTTP ${status}`, { statusCode: status, cause: error });
    }
    throw new MalformedResponse(`Response to ${command.action} is not valid XML: ${errorMessage(error)}`, { cause: error });
  }

  if (outcome.kind === 'fault') {
    moduleLogger.warn(`${command.action} on ${device.friendlyName || device.udn} returned fault ${outcome.fault.code}: ${outcome.fault.description}`);
    throw outcome.fault;
  }
  if (!isSuccess) {
    throw new TransportError(`Control request ${command.action} returned HTTP ${status}`, { statusCode: status });
  }
  if (outcome.kind === 'missing-response') {
    throw new MalformedResponse(`Response to ${command.action} has no ${command.action}Response element`);
  }

  moduleLogger.debug(`${command.action} succeeded`, { result: outcome.values });
  return outcome.values;
}
