/**
 * @licensekit/xml: the document tree capability: element tree, strict
 * parser and deterministic writer.
 *
 * @packageDocumentation
 */

export { XmlElement, XmlText, XmlCData, XmlComment } from './tree';
export type { XmlNode, XmlAttribute, XmlElementInit } from './tree';
export { parseXml } from './parser';
export { writeXml, escapeText, escapeAttribute } from './writer';
export type { WriteOptions } from './writer';
