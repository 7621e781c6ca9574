export { reconstruct, reconstructAll } from "./reconstruct.js";
export type { ReconstructResult } from "./reconstruct.js";
