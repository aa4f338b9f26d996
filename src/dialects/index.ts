export type { ConnectorHandle, SourceConnector } from './source';
export type { StorageSink } from './target';
export { defaultConnectors, openSource, listSourceTypes, type ConnectorRegistry } from './source-registry';
export { createSink, type SinkOptions } from './target-registry';
