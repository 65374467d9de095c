// קובץ זה מכיל את הלוגיקה לניהול סוקט SSDP (UDP) עבור חיפוש M-SEARCH

import * as dgram from 'node:dgram';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('ssdpSocketManager');

export const SSDP_PORT = 1900;
export const SSDP_MULTICAST_ADDRESS_IPV4 = '239.255.255.250';
const M_SEARCH_REQUEST_START_LINE = 'M-SEARCH * HTTP/1.1';
const MX_VALUE = 2; // שניות שההתקן רשאי להשהות את התשובה
const USER_AGENT = 'Node.js/UPnP/1.0 wemo.js/0.1';
const DEFAULT_MULTICAST_TTL = 4;

export type OnSsdpMessage = (msg: Buffer, rinfo: dgram.RemoteInfo) => void;
export type OnSsdpError = (err: Error) => void;

export interface SearchSocket {
  /** שולח M-SEARCH אחד לקבוצת ה-multicast. */
  sendMSearch(target: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * @hebrew בונה הודעת M-SEARCH עבור ST נתון.
 */
export function buildMSearchMessage(target: string, mx: number = MX_VALUE): string {
  return [
    M_SEARCH_REQUEST_START_LINE,
    `HOST: ${SSDP_MULTICAST_ADDRESS_IPV4}:${SSDP_PORT}`,
    `MAN: "ssdp:discover"`,
    `MX: ${mx}`,
    `ST: ${target}`,
    `USER-AGENT: ${USER_AGENT}`,
    '', ''].join('\r\n');
}

/**
 * @hebrew יוצר סוקט UDP עצמאי לחיפוש, קשור לפורט זמני.
 * כל קריאה לגילוי מקבלת סוקט משלה כך שסבבי גילוי מקבילים אינם מפריעים זה לזה.
 *
 * @param onMessage - נקרא עבור כל תשובה unicast שמגיעה לסוקט.
 * @param onError - נקרא על שגיאת סוקט אחרי שהקשירה הצליחה.
 * @param bindAddress - כתובת מקומית לקשירה.
 * @throws שגיאת הקשירה אם הסוקט לא נקשר.
 */
export function createSearchSocket(
  onMessage: OnSsdpMessage,
  onError: OnSsdpError,
  bindAddress: string = '0.0.0.0'
): Promise<SearchSocket> {
  return new Promise<SearchSocket>((resolve, reject) => {
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    let bound = false;
    let closed = false;

    const close = (): Promise<void> => new Promise<void>((resolveClose) => {
      if (closed) {
        resolveClose();
        return;
      }
      closed = true;
      try {
        socket.close(() => {
          logger.trace('Search socket closed.');
          resolveClose();
        });
      } catch (err: unknown) {
        logger.debug('Search socket was already closed', { error: err });
        resolveClose();
      }
    });

    socket.on('error', (err) => {
      logger.error('Search socket error', { error: err });
      if (bound) {
        onError(err);
      } else {
        reject(err);
      }
      void close();
    });

    socket.on('message', (msg, rinfo) => {
      onMessage(msg, rinfo);
    });

    socket.bind(0, bindAddress, () => {
      bound = true;
      try {
        socket.setMulticastTTL(DEFAULT_MULTICAST_TTL);
      } catch (err: unknown) {
        logger.warn('Could not set multicast TTL on search socket', { error: err });
      }
      logger.debug(`Search socket listening on ${bindAddress}:${socket.address().port}`);

      const sendMSearch = (target: string): Promise<void> => {
        const buffer = Buffer.from(buildMSearchMessage(target));
        return new Promise<void>((resolveSend, rejectSend) => {
          socket.send(buffer, 0, buffer.length, SSDP_PORT, SSDP_MULTICAST_ADDRESS_IPV4, (err) => {
            if (err) {
              logger.error(`Error sending M-SEARCH for target ${target}`, { error: err });
              rejectSend(err);
            } else {
              logger.debug(`M-SEARCH sent to ${SSDP_MULTICAST_ADDRESS_IPV4}:${SSDP_PORT} for target ${target}`);
              resolveSend();
            }
          });
        });
      };

      resolve({ sendMSearch, close });
    });
  });
}
