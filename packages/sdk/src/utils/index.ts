/**
 * Utility functions for the SDK
 */

export { Mutex } from "./locks.js";
