import { describe, it, expect } from 'vitest';
import { MalformedEvent } from './errors';
import { parseEventBody } from './eventParser';
import { buildPropertySetXml } from './testFixtures';

describe('parseEventBody', () => {
  it('מחזיר את כל המשתנים מה-propertyset', async () => {
    const xml = buildPropertySetXml({ BinaryState: '1', FriendlyName: 'Test Lamp' });
    await expect(parseEventBody(xml)).resolves.toEqual({ BinaryState: '1', FriendlyName: 'Test Lamp' });
  });

  it('מקבל property יחיד וגוף מסוג Buffer', async () => {
    const xml = buildPropertySetXml({ BinaryState: '8|1700000000|0|0' });
    await expect(parseEventBody(Buffer.from(xml))).resolves.toEqual({ BinaryState: '8|1700000000|0|0' });
  });

  it('מחזיר ערך ריק למשתנה ריק', async () => {
    const xml = '<e:propertyset xmlns:e="urn:schemas-upnp-org:event-1-0"><e:property><BinaryState></BinaryState></e:property></e:propertyset>';
    await expect(parseEventBody(xml)).resolves.toEqual({ BinaryState: '' });
  });

  it('זורק MalformedEvent על XML לא תקין', async () => {
    await expect(parseEventBody('<e:propertyset><e:property>')).rejects.toBeInstanceOf(MalformedEvent);
  });

  it('זורק MalformedEvent כשהשורש אינו propertyset', async () => {
    await expect(parseEventBody('<root><BinaryState>1</BinaryState></root>')).rejects.toThrow('Event body root is not a propertyset');
  });

  it('זורק MalformedEvent על propertyset ריק', async () => {
    const xml = '<e:propertyset xmlns:e="urn:schemas-upnp-org:event-1-0"></e:propertyset>';
    await expect(parseEventBody(xml)).rejects.toThrow('Event propertyset contains no properties');
  });
});
