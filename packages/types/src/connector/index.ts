export type {
    IQueryRequest,
    IUpstreamRequest,
    IProviderResponse,
    CellValue,
    TranslatedRow,
    ITranslatedResponse
} from './IQuery.js';
export type { ConnectorErrorKind, IConnectorErrorBody } from './IConnectorError.js';
