// פענוח מסמך התיאור (setup.xml) של התקן WeMo לאובייקט WemoDevice
import { MalformedDescription, errorMessage } from './errors';
import { createModuleLogger } from './logger';
import type { WemoDevice } from './types';
import { childNode, childNodes, childText, createXmlParser, isXmlNode } from './xmlUtils';
import type { XmlNode } from './xmlUtils';

const logger = createModuleLogger('deviceDescriptionParser');

const BASIC_EVENT_MARKER = ':basicevent:';

interface ServiceEndpoints {
  serviceType: string;
  controlPath: string;
  eventSubPath: string;
}

function readService(serviceNode: unknown): ServiceEndpoints | undefined {
  const controlPath = childText(serviceNode, 'controlURL');
  const eventSubPath = childText(serviceNode, 'eventSubURL');
  if (!controlPath || !eventSubPath) {
    return undefined;
  }
  return { serviceType: childText(serviceNode, 'serviceType') ?? '', controlPath, eventSubPath };
}

/**
 * @hebrew בוחר את השירות שאליו נשלחות פקודות ומנויים: basicevent אם קיים,
 * אחרת השירות הראשון שמצהיר על controlURL ו-eventSubURL.
 * מחפש בהתקן הראשי ואחר כך בהתקנים המשניים (deviceList).
 */
function selectService(deviceNode: XmlNode): ServiceEndpoints | undefined {
  const devices: unknown[] = [deviceNode];
  for (let i = 0; i < devices.length; i++) {
    devices.push(...childNodes(childNode(devices[i], 'deviceList'), 'device'));
  }

  const services = devices
    .flatMap(device => childNodes(childNode(device, 'serviceList'), 'service'))
    .map(readService)
    .filter((service): service is ServiceEndpoints => service !== undefined);

  return services.find(service => service.serviceType.includes(BASIC_EVENT_MARKER)) ?? services[0];
}

function resolveUrl(location: string, base: string, relative: string): string {
  try {
    return new URL(relative, base).toString();
  } catch (error: unknown) {
    throw new MalformedDescription(location, `cannot resolve URL '${relative}' against '${base}'`, { cause: error });
  }
}

/**
 * @hebrew מפענח מסמך תיאור התקן. אין כאן גישה לרשת.
 * כתובות יחסיות נפתרות מול URLBase אם קיים, אחרת מול כתובת המסמך עצמו.
 * @param document - תוכן ה-XML.
 * @param location - הכתובת שממנה המסמך הגיע.
 * @throws MalformedDescription כשה-XML לא תקין או חסרים UDN, controlURL או eventSubURL.
 */
export async function parseDeviceDescription(document: string | Buffer, location: string): Promise<WemoDevice> {
  if (!URL.canParse(location)) {
    throw new MalformedDescription(location, 'location is not an absolute URL');
  }

  let parsed: unknown;
  try {
    parsed = await createXmlParser().parseStringPromise(document.toString());
  } catch (error: unknown) {
    throw new MalformedDescription(location, `XML is not well formed (${errorMessage(error)})`, { cause: error });
  }

  if (!isXmlNode(parsed)) {
    throw new MalformedDescription(location, 'document has no root element content');
  }
  const deviceNode = childNode(parsed, 'device');
  if (!deviceNode) {
    throw new MalformedDescription(location, "missing 'device' element");
  }

  const udn = childText(deviceNode, 'UDN');
  if (!udn) {
    throw new MalformedDescription(location, 'missing UDN');
  }

  const service = selectService(deviceNode);
  if (!service) {
    throw new MalformedDescription(location, 'no service declares both controlURL and eventSubURL');
  }

  const urlBase = childText(parsed, 'URLBase') ?? location;
  const controlUrl = resolveUrl(location, urlBase, service.controlPath);
  const eventSubUrl = resolveUrl(location, urlBase, service.eventSubPath);
  const deviceHost = new URL(resolveUrl(location, urlBase, '/'));

  const device: WemoDevice = {
    udn,
    friendlyName: childText(deviceNode, 'friendlyName') ?? '',
    location,
    baseUrl: `${deviceHost.protocol}//${deviceHost.host}`,
    controlUrl,
    eventSubUrl,
    serviceType: service.serviceType,
    deviceType: childText(deviceNode, 'deviceType') ?? '',
    manufacturer: childText(deviceNode, 'manufacturer'),
    modelName: childText(deviceNode, 'modelName'),
    serialNumber: childText(deviceNode, 'serialNumber'),
    host: deviceHost.hostname,
    port: Number(deviceHost.port || (deviceHost.protocol === 'https:' ? 443 : 80)),
  };

  logger.trace(`Parsed description for ${device.friendlyName || udn} at ${location}`, { controlUrl, eventSubUrl });
  return Object.freeze(device);
}
