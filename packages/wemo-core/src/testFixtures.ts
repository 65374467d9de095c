// נתוני בדיקה משותפים: מסמכי setup.xml, מעטפות SOAP ו-propertyset, בנויים עם xmlbuilder2
import { create } from 'xmlbuilder2';
import { BASIC_EVENT_SERVICE } from './types';
import type { WemoDevice } from './types';

export interface FixtureService {
  serviceType: string;
  controlURL?: string;
  eventSubURL?: string;
}

export interface SetupXmlOptions {
  udn?: string;
  friendlyName?: string;
  urlBase?: string;
  serialNumber?: string;
  services?: FixtureService[];
}

export const DEFAULT_SERVICES: FixtureService[] = [
  {
    serviceType: 'urn:Belkin:service:WiFiSetup:1',
    controlURL: '/upnp/control/WiFiSetup1',
    eventSubURL: '/upnp/event/WiFiSetup1',
  },
  {
    serviceType: BASIC_EVENT_SERVICE,
    controlURL: '/upnp/control/basicevent1',
    eventSubURL: '/upnp/event/basicevent1',
  },
];

export function buildSetupXml(options: SetupXmlOptions = {}): string {
  const root = create({ version: '1.0' }).ele('root');
  root.ele('specVersion').ele('major').txt('1').up().ele('minor').txt('0');
  if (options.urlBase) {
    root.ele('URLBase').txt(options.urlBase);
  }

  const device = root.ele('device');
  device.ele('deviceType').txt('urn:Belkin:device:controllee:1');
  device.ele('friendlyName').txt(options.friendlyName ?? 'Test Lamp');
  device.ele('manufacturer').txt('Belkin International Inc.');
  device.ele('modelName').txt('Socket');
  if (options.serialNumber) {
    device.ele('serialNumber').txt(options.serialNumber);
  }
  if (options.udn !== '') {
    device.ele('UDN').txt(options.udn ?? 'uuid:Socket-1_0-TEST0001');
  }

  const serviceList = device.ele('serviceList');
  for (const service of options.services ?? DEFAULT_SERVICES) {
    const node = serviceList.ele('service');
    node.ele('serviceType').txt(service.serviceType);
    node.ele('serviceId').txt(service.serviceType.replace('service', 'serviceId'));
    if (service.controlURL) node.ele('controlURL').txt(service.controlURL);
    if (service.eventSubURL) node.ele('eventSubURL').txt(service.eventSubURL);
    node.ele('SCPDURL').txt('/eventservice.xml');
  }
  return root.end({ prettyPrint: true });
}

const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';

export function buildSoapResponseXml(action: string, values: Record<string, string>, serviceType: string = BASIC_EVENT_SERVICE): string {
  const doc = create({ version: '1.0' });
  const response = doc
    .ele(SOAP_ENV_NS, 's:Envelope')
    .ele(SOAP_ENV_NS, 's:Body')
    .ele(serviceType, `u:${action}Response`);
  for (const [name, value] of Object.entries(values)) {
    response.ele(name).txt(value);
  }
  return doc.end();
}

export function buildSoapFaultXml(faultString: string, upnpError?: { code: string; description: string }): string {
  const doc = create({ version: '1.0' });
  const fault = doc
    .ele(SOAP_ENV_NS, 's:Envelope')
    .ele(SOAP_ENV_NS, 's:Body')
    .ele(SOAP_ENV_NS, 's:Fault');
  fault.ele('faultcode').txt('s:Client');
  fault.ele('faultstring').txt(faultString);
  if (upnpError) {
    const error = fault.ele('detail').ele('urn:schemas-upnp-org:control-1-0', 'UPnPError');
    error.ele('errorCode').txt(upnpError.code);
    error.ele('errorDescription').txt(upnpError.description);
  }
  return doc.end();
}

const EVENT_NS = 'urn:schemas-upnp-org:event-1-0';

export function buildPropertySetXml(properties: Record<string, string>): string {
  const doc = create({ version: '1.0' });
  const propertySet = doc.ele(EVENT_NS, 'e:propertyset');
  for (const [name, value] of Object.entries(properties)) {
    propertySet.ele(EVENT_NS, 'e:property').ele(name).txt(value);
  }
  return doc.end();
}

export function makeDevice(overrides: Partial<WemoDevice> = {}): WemoDevice {
  return Object.freeze({
    udn: 'uuid:Socket-1_0-TEST0001',
    friendlyName: 'Test Lamp',
    location: 'http://192.168.1.50:49153/setup.xml',
    baseUrl: 'http://192.168.1.50:49153',
    controlUrl: 'http://192.168.1.50:49153/upnp/control/basicevent1',
    eventSubUrl: 'http://192.168.1.50:49153/upnp/event/basicevent1',
    serviceType: BASIC_EVENT_SERVICE,
    deviceType: 'urn:Belkin:device:controllee:1',
    host: '192.168.1.50',
    port: 49153,
    ...overrides,
  });
}
