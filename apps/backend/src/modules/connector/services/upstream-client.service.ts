import axios, { type AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import type { ILogger, IProviderResponse, IUpstreamRequest } from '@terminal-connector/types';
import {
    RequestAbortedError,
    UpstreamRejectedError,
    UpstreamTimeoutError,
    UpstreamUnavailableError
} from '../../../lib/errors.js';
import { DEFAULT_RETRY_OPTIONS, executeWithRetry, RetryPolicy, type RetryPolicyOptions } from '../../../lib/retry.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const MAX_DETAIL_LENGTH = 200;

/**
 * Anything that can execute an upstream request. The dispatcher depends on
 * this interface so tests can substitute a spy.
 */
export interface UpstreamGateway {
    call(request: IUpstreamRequest, signal?: AbortSignal): Promise<IProviderResponse>;
}

export interface UpstreamClientOptions {
    /**
     * Provider token, sent as the `token` query parameter.
     */
    apiKey?: string;
    timeoutMs: number;
}

/**
 * Retries idempotent provider calls that failed transiently.
 *
 * Rejections (4xx) and caller aborts are final.
 */
export class UpstreamRetryPolicy extends RetryPolicy<IUpstreamRequest> {
    constructor(options: RetryPolicyOptions = DEFAULT_RETRY_OPTIONS) {
        super(options);
    }

    shouldRetry(error: unknown, request: IUpstreamRequest): boolean {
        if (request.method !== 'GET') {
            return false;
        }
        return error instanceof UpstreamTimeoutError || error instanceof UpstreamUnavailableError;
    }
}

/**
 * Pulls a human-readable reason out of a provider error body.
 *
 * Providers answer with `{ "detail": ... }`, `{ "message": ... }` or
 * `{ "error": ... }`; anything else is passed on truncated.
 */
export function extractProviderDetail(body: unknown): string | undefined {
    if (typeof body !== 'string' || !body.trim()) {
        return undefined;
    }

    const parsed = parseJson(body);
    if (isRecord(parsed)) {
        for (const key of ['detail', 'message', 'error']) {
            const value = parsed[key];
            if (typeof value === 'string' && value) {
                return value;
            }
        }
    }

    const text = body.trim();
    return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}...` : text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        return undefined;
    }
}

/**
 * Executes provider requests on the shared axios instance.
 *
 * Each call is bounded by the per-attempt timeout and the retry policy, and
 * can be cancelled through an AbortSignal (the inbound request closing).
 * The provider token is added here, never to the request object, so requests
 * stay safe to log.
 */
export class UpstreamClient implements UpstreamGateway {
    constructor(
        private readonly http: AxiosInstance,
        private readonly options: UpstreamClientOptions,
        private readonly policy: RetryPolicy<IUpstreamRequest>,
        private readonly logger: ILogger
    ) {}

    async call(request: IUpstreamRequest, signal?: AbortSignal): Promise<IProviderResponse> {
        return executeWithRetry(
            attempt => this.attempt(request, attempt, signal),
            this.policy,
            request,
            { logger: this.logger, requestLabel: `${request.widgetId} ${request.path}`, signal }
        );
    }

    private async attempt(request: IUpstreamRequest, attempt: number, signal?: AbortSignal): Promise<IProviderResponse> {
        const started = Date.now();
        const params: Record<string, string> = { ...request.query };
        if (this.options.apiKey) {
            params.token = this.options.apiKey;
        }

        let response: AxiosResponse<string>;
        try {
            response = await this.http.request<string>({
                method: request.method,
                url: request.path,
                params,
                timeout: this.options.timeoutMs,
                signal,
                responseType: 'text',
                transformResponse: [(data: unknown) => data]
            });
        } catch (error) {
            throw this.classify(error, request, signal);
        }

        this.logger.debug(
            {
                widgetId: request.widgetId,
                path: request.path,
                status: response.status,
                attempt,
                durationMs: Date.now() - started
            },
            'Upstream request completed'
        );

        return {
            status: response.status,
            payload: this.parsePayload(response.data, request)
        };
    }

    private parsePayload(body: unknown, request: IUpstreamRequest): unknown {
        if (typeof body !== 'string') {
            return body ?? null;
        }
        if (!body.trim()) {
            return null;
        }

        try {
            return JSON.parse(body);
        } catch {
            this.logger.warn({ widgetId: request.widgetId, path: request.path }, 'Upstream returned malformed JSON');
            throw new UpstreamUnavailableError('Upstream provider returned malformed JSON');
        }
    }

    private classify(error: unknown, request: IUpstreamRequest, signal?: AbortSignal): Error {
        if (signal?.aborted || axios.isCancel(error)) {
            return new RequestAbortedError();
        }

        if (!axios.isAxiosError(error)) {
            return error instanceof Error ? error : new UpstreamUnavailableError(String(error));
        }

        const response = error.response;
        if (!response) {
            return this.classifyTransport(error, request);
        }

        const status = response.status;
        const detail = extractProviderDetail(response.data);
        this.logger.warn({ widgetId: request.widgetId, path: request.path, status, detail }, 'Upstream request failed');

        if (status === 408 || status === 429 || status >= 500) {
            return new UpstreamUnavailableError(`Upstream provider responded with status ${status}`, { status });
        }
        if (status >= 400) {
            const message = detail
                ? `Upstream provider rejected the request (${status}): ${detail}`
                : `Upstream provider rejected the request (${status})`;
            return new UpstreamRejectedError(message, status);
        }
        return new UpstreamUnavailableError(`Unexpected upstream status ${status}`, { status });
    }

    private classifyTransport(error: AxiosError, request: IUpstreamRequest): Error {
        const code = error.code ?? 'UNKNOWN';
        this.logger.warn({ widgetId: request.widgetId, path: request.path, code }, 'Upstream transport failure');

        if (TIMEOUT_CODES.has(code)) {
            return new UpstreamTimeoutError(`Upstream provider did not respond within ${this.options.timeoutMs}ms`);
        }
        return new UpstreamUnavailableError('Upstream provider could not be reached', { code });
    }
}
