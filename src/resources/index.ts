/**
 * Resources Module Index
 */

export { ResourceInstance, type ResourceSnapshot } from "./instance.js";
export {
  ResourceTypeRegistry,
  type ResourceTypeRegistration,
  type InstantiateRequest,
} from "./registry.js";
export { ResourceStore } from "./store.js";
