/**
 * Utility exports
 */
export { sendError, sendBridgeError, toIsoString } from "./response.js";
