import type { z } from 'zod';
import { HttpClient, discardBody, generateRequestId } from '../http/client.js';
import { retryAsync } from '../http/retry.js';
import { UpstreamError, describeError, isRetryableError } from '../mcp/errors.js';
import type { Logger } from '../logging.js';
import type { UpstreamClientOptions } from './types.js';

export interface PostTextOptions<T> {
  service: string;
  url: string;
  text: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * POSTs `{"teacs": text}` with retries and validates the JSON reply.
 * One correlation id covers every attempt of the call.
 */
export async function postText<T>(
  http: HttpClient,
  options: UpstreamClientOptions,
  logger: Logger,
  request: PostTextOptions<T>
): Promise<T> {
  const requestId = generateRequestId();

  return retryAsync(
    async (attempt) => {
      logger.debug({ service: request.service, requestId, attempt }, 'calling upstream');
      return http.request(request.url, { method: 'POST', json: { teacs: request.text }, requestId }, async (response) => {
        if (!response.ok) {
          await discardBody(response);
          throw UpstreamError.fromStatus(response.status);
        }

        let body: unknown;
        try {
          body = await response.json();
        } catch (error) {
          throw new UpstreamError(`invalid upstream payload: ${describeError(error)}`, { retryable: false, cause: error });
        }

        const parsed = request.schema.safeParse(body);
        if (!parsed.success) {
          throw new UpstreamError('invalid upstream payload: unexpected shape', { retryable: false, cause: parsed.error });
        }
        return parsed.data;
      });
    },
    {
      retries: options.retries,
      initialDelayMs: options.initialDelayMs,
      maxDelayMs: options.maxDelayMs,
      shouldRetry: (error) => isRetryableError(error),
      onRetry: (error, attempt, delayMs) => {
        logger.warn(
          { service: request.service, requestId, attempt, delayMs, err: describeError(error) },
          'upstream call failed, retrying'
        );
      }
    }
  );
}
