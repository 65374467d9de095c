// גילוי התקני WeMo ברשת המקומית באמצעות SSDP M-SEARCH
import axios from 'axios';
import type { RemoteInfo } from 'node:dgram';

import { config } from './config';
import { parseDeviceDescription } from './deviceDescriptionParser';
import { MalformedDescription, TransportError, errorMessage } from './errors';
import { HTTP_RESPONSE_TYPE, parseHttpPacket } from './genericHttpParser';
import { createModuleLogger } from './logger';
import { createSearchSocket } from './ssdpSocketManager';
import type { SearchSocket } from './ssdpSocketManager';
import { WEMO_PORTS } from './types';
import type { DiscoveryOptions, WemoDevice } from './types';

const logger = createModuleLogger('wemoDiscovery');

const SEARCH_ALL = 'ssdp:all';
const SETUP_XML_PATH = '/setup.xml';

interface FetchDescriptionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * @hebrew מוריד מסמך תיאור ב-GET פשוט ומפענח אותו.
 * @throws TransportError על כשל רשת או סטטוס שאינו 2xx, MalformedDescription על תוכן לא תקין.
 */
async function fetchDescription(location: string, options: FetchDescriptionOptions): Promise<WemoDevice> {
  let body: string;
  try {
    const response = await axios.get<string>(location, {
      responseType: 'text',
      timeout: options.timeoutMs,
      signal: options.signal,
    });
    body = response.data;
  } catch (error: unknown) {
    const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
    throw new TransportError(`Failed to fetch description from ${location}: ${errorMessage(error)}`, { cause: error, statusCode });
  }
  return parseDeviceDescription(body, location);
}

/**
 * @hebrew מחלץ את ה-LOCATION מתשובת SSDP, או undefined אם ההודעה אינה תשובה רלוונטית.
 */
function readSearchResponse(msg: Buffer, rinfo: RemoteInfo, searchTarget: string): string | undefined {
  const packet = parseHttpPacket(msg, HTTP_RESPONSE_TYPE);
  if (!packet || packet.statusCode !== 200) {
    logger.trace(`Ignoring non-response SSDP message from ${rinfo.address}:${rinfo.port}`);
    return undefined;
  }
  const st = packet.headers['st'];
  if (searchTarget !== SEARCH_ALL && st !== undefined && st !== searchTarget) {
    logger.trace(`Ignoring SSDP response for ST '${st}' from ${rinfo.address}`);
    return undefined;
  }
  const location = packet.headers['location'];
  if (!location) {
    logger.debug(`SSDP response from ${rinfo.address} has no LOCATION header`);
    return undefined;
  }
  return location;
}

/**
 * @hebrew שולח M-SEARCH אחד וממתין לתשובות עד timeoutMs.
 * לכל LOCATION ייחודי מוריד ומפענח את מסמך התיאור; כשלים של התקן בודד נרשמים ומדולגים.
 * התוצאה ללא כפילויות לפי UDN (התשובה האחרונה גוברת).
 * בקשות תיאור שלא הסתיימו עד הזמן מבוטלות, כך שהקריאה לא חורגת מ-timeoutMs.
 *
 * @throws TransportError אם לא ניתן לקשור את הסוקט או לשלוח את החיפוש.
 */
export async function discover(options: DiscoveryOptions = {}): Promise<WemoDevice[]> {
  const timeoutMs = options.timeoutMs ?? config.discovery.timeoutMs;
  const searchTarget = options.searchTarget ?? config.discovery.searchTarget;
  const bindAddress = options.bindAddress ?? config.discovery.bindAddress;

  // replyOrder: מספר התשובה שממנה הגיע המסמך, כך שהורדה איטית לא דורסת תשובה חדשה יותר
  const devicesByUdn = new Map<string, { device: WemoDevice; replyOrder: number }>();
  const seenLocations = new Set<string>();
  let replyCount = 0;
  const pendingFetches: Promise<void>[] = [];
  const abortController = new AbortController();
  let failSearch: (error: Error) => void = () => undefined;

  const onMessage = (msg: Buffer, rinfo: RemoteInfo): void => {
    const location = readSearchResponse(msg, rinfo, searchTarget);
    if (!location || seenLocations.has(location) || abortController.signal.aborted) {
      return;
    }
    seenLocations.add(location);
    const replyOrder = replyCount++;
    logger.debug(`Device answered from ${rinfo.address}, fetching ${location}`);

    pendingFetches.push(
      fetchDescription(location, { timeoutMs, signal: abortController.signal })
        .then((device) => {
          if (abortController.signal.aborted) return;
          const known = devicesByUdn.get(device.udn);
          if (known && known.replyOrder > replyOrder) {
            logger.debug(`Ignoring ${location} for ${device.udn}; a later reply already answered`);
            return;
          }
          devicesByUdn.set(device.udn, { device, replyOrder });
          logger.info(`Discovered ${device.friendlyName || device.udn} at ${device.baseUrl}`);
        })
        .catch((error: unknown) => {
          if (abortController.signal.aborted) {
            logger.debug(`Description fetch for ${location} abandoned at the discovery deadline`);
          } else {
            logger.warn(`Skipping device at ${location}: ${errorMessage(error)}`);
          }
        })
    );
  };

  let socket: SearchSocket;
  try {
    socket = await createSearchSocket(onMessage, (error) => failSearch(error), bindAddress);
  } catch (error: unknown) {
    throw new TransportError(`Cannot open SSDP search socket on ${bindAddress}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    await socket.sendMSearch(searchTarget);
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(resolve, timeoutMs);
      failSearch = (error) => {
        clearTimeout(timer);
        reject(new TransportError(`SSDP search socket failed: ${error.message}`, { cause: error }));
      };
    });
  } catch (error: unknown) {
    if (error instanceof TransportError) throw error;
    throw new TransportError(`Failed to send M-SEARCH: ${errorMessage(error)}`, { cause: error });
  } finally {
    abortController.abort();
    await socket.close();
    await Promise.allSettled(pendingFetches);
  }

  const devices = [...devicesByUdn.values()].map(entry => entry.device);
  logger.info(`Discovery finished: ${devices.length} device(s) from ${seenLocations.size} response location(s)`);
  return devices;
}

/**
 * @hebrew מאתר התקן WeMo בכתובת IP ידועה. הפורט של WeMo זז בין 49152 ל-49155,
 * לכן כל פורט נבדק לפי הסדר עד שאחד מחזיר setup.xml תקין.
 * @throws TransportError אם אף פורט לא ענה, MalformedDescription אם התקן ענה עם מסמך לא תקין.
 */
export async function fetchDeviceAtAddress(
  host: string,
  ports: readonly number[] = WEMO_PORTS,
  timeoutMs: number = config.discovery.timeoutMs
): Promise<WemoDevice> {
  const failures: string[] = [];
  for (const port of ports) {
    const location = `http://${host}:${port}${SETUP_XML_PATH}`;
    try {
      const device = await fetchDescription(location, { timeoutMs });
      logger.info(`Found ${device.friendlyName || device.udn} at ${host}:${port}`);
      return device;
    } catch (error: unknown) {
      if (error instanceof MalformedDescription) throw error;
      logger.debug(`No device description at ${location}: ${errorMessage(error)}`);
      failures.push(`${port}: ${errorMessage(error)}`);
    }
  }
  throw new TransportError(`No WeMo device answered at ${host} (${failures.join('; ')})`);
}
