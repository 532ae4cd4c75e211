export { DEFAULT_REGISTRIES, InMemoryRegistryService } from "./memory";
export { FileRegistryService } from "./file";
