export type { Binding, ObjectHandler } from "./object-handler.js";
export {
  type LookupBackend,
  mapLookup,
  accessorLookup,
  propertyLookup,
  DEFAULT_BACKENDS,
  findBackend,
} from "./lookup.js";
export {
  GuardedBinding,
  ReflectionObjectHandler,
  searchScopes,
  fingerprint,
  shapeOf,
  type BindingStats,
  type ReflectionObjectHandlerOptions,
} from "./reflection-handler.js";
