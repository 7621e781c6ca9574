export { resolveType, resolveField, collectMarkers } from "./resolve.js";
export type { ResolveOptions } from "./resolve.js";
export { describeType } from "./describe.js";
