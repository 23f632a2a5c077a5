/**
 * Attributes Module
 *
 * Well-known attribute names and list/map marshalling into PropLists
 */

export { SoundAttr } from './attrs';
export type { SoundAttrName } from './attrs';
export { fromAttributeList, fromAttributeMap, marshalAttributes } from './marshal';
