export { resolveConfig, type AppConfig } from './config.js';
export { DefaultProjectDetector, defaultMarkers, mcpConfigFiles, type DefaultDetectorOptions, type DetectionResult, type ProjectDetector } from './detector.js';
export * from './errors.js';
export { canonicalTransport, normalizeMcpConfig, parseMcpConfig, readMcpConfigFile, type ConfigShape, type NormalizedConfig, type NormalizeOptions } from './normalize.js';
export { absolutePath, canonicalPath, expandHome } from './paths.js';
export { ProjectRegistry, projectKey, toProjectInfo, type RegistryEvent, type RegistryOptions } from './registry.js';
export { scanForProjects, scanFromSettings, type ScanOptions, type ScanResult } from './scan.js';
export { FileStorage, MemoryStorage, defaultStorageRoot, type Storage } from './storage.js';
export * from './types.js';
export { isExcluded, walkRoot, type VisitedSet, type WalkOptions, type WalkResult, type WalkSettings } from './walker.js';
