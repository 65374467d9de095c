import {
  WemoEventingSubsystem,
  binaryStateFromEvent,
  discover,
  isOn,
} from '../packages/wemo-core/src/index'; // שימוש בנתיב יחסי
import type { WemoEvent } from '../packages/wemo-core/src/index';
import { createModuleLogger } from '../packages/wemo-core/src/logger';

const logger = createModuleLogger('WemoEventsExample');

/*
הרצה:
  npm run example:events
  LOG_LEVEL=debug LISTENER_ADVERTISE_ADDRESS=192.168.1.10 npm run example:events
*/

async function main(): Promise<void> {
  const devices = await discover({ timeoutMs: 4000 });
  if (devices.length === 0) {
    logger.warn('No WeMo devices answered the search.');
    return;
  }

  const eventing = new WemoEventingSubsystem();
  const callbackBaseUrl = await eventing.start();
  logger.info(`Listening for events at ${callbackBaseUrl}`);

  for (const device of devices) {
    const onEvent = (event: WemoEvent): void => {
      const state = binaryStateFromEvent(event);
      if (state !== undefined) {
        logger.info(`${device.friendlyName} is now ${isOn(state) ? 'ON' : 'OFF'} (BinaryState=${state})`);
      } else {
        logger.info(`${device.friendlyName} event`, { properties: event.properties });
      }
    };

    try {
      const sid = await eventing.subscribe(device, onEvent, {
        onSubscriptionLost: (id, error) => logger.error(`Lost subscription ${id} to ${device.friendlyName}: ${error.message}`),
      });
      logger.info(`Subscribed to ${device.friendlyName} (${sid})`);
    } catch (error) {
      logger.error(`Could not subscribe to ${device.friendlyName}`, { error });
    }
  }

  const shutdown = (): void => {
    logger.info('Shutting down...');
    eventing.shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.error('Example failed', { error });
  process.exitCode = 1;
});
