export { ConnectorModule, loadAppsManifest } from './ConnectorModule.js';
export type { IConnectorModuleDependencies } from './ConnectorModule.js';

export { WidgetRegistry } from './registry/widget-registry.js';
export { CredentialGuard } from './services/credential-guard.service.js';
export { SchemaTranslator } from './services/schema-translator.service.js';
export { UpstreamClient, UpstreamRetryPolicy } from './services/upstream-client.service.js';
export type { UpstreamGateway } from './services/upstream-client.service.js';
export { QueryDispatcher } from './services/query-dispatcher.service.js';
export { widgetCatalog } from './widgets/index.js';
