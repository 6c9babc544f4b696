export * from './auth.js';
export * from './channels.js';
export * from './events.js';
export * from './messages.js';
export { convertHashmap, xmlMap } from './hashmap.js';
export { defineXmlModel, parseXml } from './xml.js';
export type { XmlModel, XmlModelDefinition, XmlModelOutput } from './xml.js';
