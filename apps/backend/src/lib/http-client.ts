import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';

/**
 * Creates the shared axios instance used for provider calls.
 *
 * One instance (and its keep-alive agent) serves every concurrent request.
 */
export function createHttpClient(defaults: Omit<CreateAxiosDefaults, 'headers'> = {}): AxiosInstance {
  const client = axios.create({
    timeout: 30_000,
    ...defaults,
    headers: {
      'User-Agent': 'terminal-connector/0.1',
      Accept: 'application/json'
    }
  });

  client.interceptors.response.use(
    response => response,
    error => {
      if (axios.isAxiosError(error) && error.response) {
        error.message = `HTTP ${error.response.status}: ${error.response.statusText}`;
      }
      return Promise.reject(error);
    }
  );

  return client;
}
