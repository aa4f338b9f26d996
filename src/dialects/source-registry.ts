import { SOURCE_TYPES, type SourceSpec, type SourceType, type SpecOf } from '../config/types';
import type { ConnectorHandle, SourceConnector } from './source';
import { sqlDesktopConnector } from './source/sql-desktop';
import { saasApiConnector } from './source/saas-api';

/**
 * One connector per source type. The mapped type makes the set closed:
 * adding a source type without a connector fails to compile.
 */
export type ConnectorRegistry = { readonly [K in SourceType]: SourceConnector<SpecOf<K>> };

export const defaultConnectors: ConnectorRegistry = {
  sql_desktop: sqlDesktopConnector(),
  saas_api: saasApiConnector(),
};

/**
 * Open a source through the connector registered for its type
 */
export const openSource = (spec: SourceSpec, connectors: ConnectorRegistry = defaultConnectors): Promise<ConnectorHandle> => {
  switch (spec.sourceType) {
    case 'sql_desktop':
      return connectors.sql_desktop.open(spec);
    case 'saas_api':
      return connectors.saas_api.open(spec);
  }
};

/**
 * List all supported source types
 */
export const listSourceTypes = (): SourceType[] => [...SOURCE_TYPES];
