/**
 * Machine-readable error kinds returned to the terminal.
 */
export type ConnectorErrorKind =
    | 'UNAUTHORIZED'
    | 'UNKNOWN_WIDGET'
    | 'NOT_FOUND'
    | 'VALIDATION_ERROR'
    | 'UPSTREAM_TIMEOUT'
    | 'UPSTREAM_UNAVAILABLE'
    | 'UPSTREAM_REJECTED'
    | 'TRANSLATION_ERROR'
    | 'INTERNAL_ERROR';

/**
 * JSON body of every failed response.
 *
 * @example
 * ```json
 * { "success": false, "error": { "kind": "VALIDATION_ERROR", "message": "Missing required parameter \"symbol\"", "field": "symbol" } }
 * ```
 */
export interface IConnectorErrorBody {
    success: false;
    error: {
        kind: ConnectorErrorKind;
        message: string;

        /**
         * Offending parameter or column, when the error concerns one.
         */
        field?: string;
    };
}
