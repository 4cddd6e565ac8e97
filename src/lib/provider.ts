import { isProviderKeyConfigured, type ProviderConfig } from '../config';
import {
  ProviderNotConfiguredError,
  UpstreamAuthError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from './errors';

function isTimeout(err: unknown): boolean {
  // fetch rejects with a DOMException here, which need not extend Error
  return (
    typeof err === 'object' &&
    err !== null &&
    'name' in err &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}

/**
 * One POST to the provider's OpenAI-compatible API, bounded by the
 * configured timeout. Returns the decoded JSON body; never retries.
 *
 * @param operation - human-readable name used in errors and logs
 */
export async function requestProviderApi(
  config: ProviderConfig,
  path: string,
  body: BodyInit,
  operation: string,
): Promise<unknown> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.apiKey}`,
  };
  if (typeof body === 'string') {
    headers['Content-Type'] = 'application/json';
  }

  let response: Response;
  try {
    response = await fetch(`${config.baseUrl}${path}`, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (err) {
    if (isTimeout(err)) {
      console.error(`${operation} timed out after ${config.timeoutMs}ms`);
      throw new UpstreamTimeoutError(operation, { cause: err });
    }
    console.error(`${operation} request failed:`, err);
    throw new UpstreamUnavailableError(operation, { cause: err });
  }

  if (response.status === 401 || response.status === 403) {
    console.error(
      `${operation} rejected by provider: invalid API key (status ${response.status})`,
    );
    throw new UpstreamAuthError();
  }
  if (!response.ok) {
    console.error(`${operation} failed with status ${response.status}`);
    throw new UpstreamUnavailableError(operation);
  }

  try {
    return await response.json();
  } catch (err) {
    if (isTimeout(err)) {
      console.error(`${operation} timed out while reading the response`);
      throw new UpstreamTimeoutError(operation, { cause: err });
    }
    console.error(`${operation} returned an unreadable body:`, err);
    throw new UpstreamUnavailableError(operation, { cause: err });
  }
}

export function assertProviderConfigured(config: ProviderConfig): void {
  if (!isProviderKeyConfigured(config.apiKey)) {
    throw new ProviderNotConfiguredError();
  }
}
