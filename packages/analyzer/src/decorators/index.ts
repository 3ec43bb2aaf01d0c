export { Attach } from './attach.js';
export type { AttachArgs, MarkerFieldsOf } from './attach.js';
export { Implements } from './implements.js';
export { Marker } from './marker.js';
export { Constant, Method, Param, Prop } from './members.js';
export type { TypedDeclaration } from './members.js';
export type { UniversalDecorator } from './site.js';
