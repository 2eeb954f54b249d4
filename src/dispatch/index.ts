export { StorageDispatcher } from './dispatcher.js';
export { ProviderPipeline } from './pipeline.js';
export type { StoragePipeline, ProviderPipelineOptions } from './pipeline.js';
export { createDefaultPipelines, createDefaultDispatcher, isExistingRelativePath, isLocalUri } from './defaults.js';
export type { DispatcherDependencies } from './defaults.js';
