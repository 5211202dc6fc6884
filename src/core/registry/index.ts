/**
 * Entity Registry Module
 *
 * @module
 */

export * from "./interfaces/IEntityRegistry.js";
export { EntityRegistry, generateEntityId, type EntityRegistryOptions } from "./impl/EntityRegistry.js";
export { MemoryRegistryStorage, FileRegistryStorage, REGISTRY_FILE } from "./impl/RegistryStorage.js";
