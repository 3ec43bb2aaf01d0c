export { StaticMarkerRegistry } from './static-registry.js';
export type {
  MemberDeclaration,
  MemberRecord,
  ParameterDeclaration,
  ParameterRecord,
  StructureRecord,
} from './static-registry.js';
