import { WemoSwitch, discover, isOn } from '../packages/wemo-core/src/index';
import { createModuleLogger } from '../packages/wemo-core/src/logger';

const logger = createModuleLogger('ToggleSwitchExample');

// שימוש: npm run example:switch -- [ip-address]
async function main(): Promise<void> {
  const host = process.argv[2];

  let wemoSwitch: WemoSwitch;
  if (host) {
    wemoSwitch = await WemoSwitch.fromAddress(host);
  } else {
    const [first] = await discover({ timeoutMs: 3000 });
    if (!first) {
      logger.warn('No WeMo devices found.');
      return;
    }
    wemoSwitch = new WemoSwitch(first);
  }

  const before = await wemoSwitch.getBinaryStateWithRetry();
  logger.info(`${wemoSwitch.device.friendlyName} is ${isOn(before) ? 'ON' : 'OFF'}`);

  const after = await wemoSwitch.toggle();
  logger.info(`${wemoSwitch.device.friendlyName} is now ${isOn(after) ? 'ON' : 'OFF'}`);
}

main().catch((error: unknown) => {
  logger.error('Example failed', { error });
  process.exitCode = 1;
});
