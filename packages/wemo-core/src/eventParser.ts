import { MalformedEvent, errorMessage } from './errors';
import { childNodes, createXmlParser, isXmlNode, textValue } from './xmlUtils';

/**
 * @hebrew מפענח גוף NOTIFY של GENA (<e:propertyset>) למפת שם משתנה -> ערך.
 * ערך של משתנה מבני (למשל XML מקונן) נשמר ריק.
 * @throws MalformedEvent כשה-XML לא תקין, השורש אינו propertyset או שאין אף property.
 */
export async function parseEventBody(xml: string | Buffer): Promise<Record<string, string>> {
  let parsed: unknown;
  try {
    parsed = await createXmlParser({ explicitRoot: true }).parseStringPromise(xml.toString());
  } catch (error: unknown) {
    throw new MalformedEvent(`Event body is not well formed XML: ${errorMessage(error)}`, { cause: error });
  }

  if (!isXmlNode(parsed) || !('propertyset' in parsed)) {
    throw new MalformedEvent('Event body root is not a propertyset');
  }

  const properties: Record<string, string> = {};
  for (const property of childNodes(parsed.propertyset, 'property')) {
    if (!isXmlNode(property)) continue;
    for (const [name, value] of Object.entries(property)) {
      if (name === '$') continue;
      properties[name] = textValue(value) ?? '';
    }
  }

  if (Object.keys(properties).length === 0) {
    throw new MalformedEvent('Event propertyset contains no properties');
  }
  return properties;
}
