import * as xml2js from 'xml2js';

export type XmlNode = Record<string, unknown>;

/**
 * @hebrew פרסר xml2js בתצורה שבה כל החבילה משתמשת: ללא מערכים לאלמנט בודד וללא קידומות namespace.
 */
export function createXmlParser(options: { explicitRoot?: boolean } = {}): xml2js.Parser {
  return new xml2js.Parser({
    explicitArray: false,
    explicitRoot: options.explicitRoot ?? false,
    tagNameProcessors: [xml2js.processors.stripPrefix],
    attrNameProcessors: [xml2js.processors.stripPrefix],
  });
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** ילד בודד של אלמנט, אם הוא אלמנט. */
export function childNode(node: unknown, name: string): XmlNode | undefined {
  if (!isXmlNode(node)) return undefined;
  const child = node[name];
  return isXmlNode(child) ? child : undefined;
}

/** כל המופעים של אלמנט חוזר (xml2js מחזיר אובייקט בודד כשיש מופע אחד). */
export function childNodes(node: unknown, name: string): unknown[] {
  if (!isXmlNode(node)) return [];
  const child = node[name];
  if (child === undefined) return [];
  return Array.isArray(child) ? child : [child];
}

/**
 * @hebrew ממיר ערך שהגיע מ-xml2js לטקסט: מחרוזת, או אלמנט עם מאפיינים שהטקסט שלו ב-`_`.
 * אלמנט ריק או מבני מחזיר undefined.
 */
export function textValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isXmlNode(value) && typeof value._ === 'string') return value._;
  return undefined;
}

/** טקסט של ילד בשם נתון, לאחר trim. מחרוזת ריקה נחשבת חסרה. */
export function childText(node: unknown, name: string): string | undefined {
  if (!isXmlNode(node)) return undefined;
  const text = textValue(node[name])?.trim();
  return text ? text : undefined;
}
