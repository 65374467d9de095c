import { describe, it, expect } from 'vitest';
import { parseDeviceDescription } from './deviceDescriptionParser';
import { MalformedDescription } from './errors';
import { BASIC_EVENT_SERVICE } from './types';
import { buildSetupXml } from './testFixtures';

const LOCATION = 'http://192.168.1.50:49153/setup.xml';

describe('parseDeviceDescription', () => {
  it('מחזיר התקן עם כתובות מוחלטות של שירות basicevent', async () => {
    const device = await parseDeviceDescription(
      buildSetupXml({ friendlyName: 'Living Room Lamp', serialNumber: '221517K0101769' }),
      LOCATION
    );

    expect(device).toEqual({
      udn: 'uuid:Socket-1_0-TEST0001',
      friendlyName: 'Living Room Lamp',
      location: LOCATION,
      baseUrl: 'http://192.168.1.50:49153',
      controlUrl: 'http://192.168.1.50:49153/upnp/control/basicevent1',
      eventSubUrl: 'http://192.168.1.50:49153/upnp/event/basicevent1',
      serviceType: BASIC_EVENT_SERVICE,
      deviceType: 'urn:Belkin:device:controllee:1',
      manufacturer: 'Belkin International Inc.',
      modelName: 'Socket',
      serialNumber: '221517K0101769',
      host: '192.168.1.50',
      port: 49153,
    });
  });

  it('מחזיר אובייקט מוקפא וזהה בשני פענוחים של אותו מסמך', async () => {
    const xml = buildSetupXml();
    const first = await parseDeviceDescription(xml, LOCATION);
    const second = await parseDeviceDescription(Buffer.from(xml), LOCATION);

    expect(Object.isFrozen(first)).toBe(true);
    expect(second).toEqual(first);
  });

  it('פותר כתובות יחסיות מול URLBase כשהוא קיים', async () => {
    const xml = buildSetupXml({
      urlBase: 'http://192.168.1.60:49154/',
      services: [{
        serviceType: BASIC_EVENT_SERVICE,
        controlURL: 'upnp/control/basicevent1',
        eventSubURL: 'upnp/event/basicevent1',
      }],
    });

    const device = await parseDeviceDescription(xml, LOCATION);

    expect(device.controlUrl).toBe('http://192.168.1.60:49154/upnp/control/basicevent1');
    expect(device.eventSubUrl).toBe('http://192.168.1.60:49154/upnp/event/basicevent1');
    expect(device.baseUrl).toBe('http://192.168.1.60:49154');
    expect(device.port).toBe(49154);
  });

  it('משאיר כתובת שכבר מוחלטת כפי שהיא', async () => {
    const xml = buildSetupXml({
      services: [{
        serviceType: BASIC_EVENT_SERVICE,
        controlURL: 'http://192.168.1.70:49155/upnp/control/basicevent1',
        eventSubURL: '/upnp/event/basicevent1',
      }],
    });

    const device = await parseDeviceDescription(xml, LOCATION);

    expect(device.controlUrl).toBe('http://192.168.1.70:49155/upnp/control/basicevent1');
    expect(device.eventSubUrl).toBe('http://192.168.1.50:49153/upnp/event/basicevent1');
  });

  it('בוחר את השירות הראשון עם control ו-event כשאין basicevent', async () => {
    const xml = buildSetupXml({
      services: [
        { serviceType: 'urn:Belkin:service:metainfo:1', controlURL: '/upnp/control/metainfo1' },
        { serviceType: 'urn:Belkin:service:bridge:1', controlURL: '/upnp/control/bridge1', eventSubURL: '/upnp/event/bridge1' },
      ],
    });

    const device = await parseDeviceDescription(xml, LOCATION);

    expect(device.serviceType).toBe('urn:Belkin:service:bridge:1');
    expect(device.controlUrl).toBe('http://192.168.1.50:49153/upnp/control/bridge1');
  });

  it('זורק MalformedDescription כשאין UDN', async () => {
    await expect(parseDeviceDescription(buildSetupXml({ udn: '' }), LOCATION))
      .rejects.toBeInstanceOf(MalformedDescription);
  });

  it('זורק MalformedDescription כשאין eventSubURL לאף שירות', async () => {
    const xml = buildSetupXml({
      services: [{ serviceType: BASIC_EVENT_SERVICE, controlURL: '/upnp/control/basicevent1' }],
    });

    await expect(parseDeviceDescription(xml, LOCATION)).rejects.toThrow(/no service declares both/);
  });

  it('זורק MalformedDescription על XML לא תקין', async () => {
    const error = await parseDeviceDescription('<root><device><UDN>uuid:x</device>', LOCATION).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedDescription);
    expect(error).toHaveProperty('location', LOCATION);
  });

  it('זורק MalformedDescription כשאין אלמנט device', async () => {
    await expect(parseDeviceDescription('<root><specVersion><major>1</major></specVersion></root>', LOCATION))
      .rejects.toThrow("missing 'device' element");
  });
});
