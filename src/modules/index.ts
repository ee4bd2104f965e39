/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { process } from "./processor";
export { simple } from "./simple";
export { recovery } from "./recovery";
export { stats } from "./stats";
