import type { z } from 'zod';
import { logger } from '../shared/logger.js';
import { DecodeError, HeadNotFoundError, RetryExhaustedError, TransportError } from '../shared/errors.js';
import { getUrl, nodeFetchGet } from './http.js';
import {
  blobSidecarsResponseSchema,
  blockHeaderResponseSchema,
  blockHeadersResponseSchema,
  type BeaconClient,
  type BeaconClientConfig,
  type BeaconClientDeps,
  type HttpResponse,
  type SidecarRecord,
} from './types.js';

const HTTP_NOT_FOUND = 404;

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

// One logical resource: where it lives, what it decodes to, and what a 404 means
type Resource<S extends z.ZodTypeAny, T> = {
  path: string;
  schema: S;
  notFound: T;
  extract: (payload: z.infer<S>) => T;
};

export const createBeaconClient = (
  config: BeaconClientConfig,
  deps: BeaconClientDeps = {}
): BeaconClient => {
  const httpGet = deps.httpGet ?? nodeFetchGet;
  const wait = deps.sleep ?? sleep;

  const decode = <S extends z.ZodTypeAny, T>(
    resource: Resource<S, T>,
    response: HttpResponse,
    slot: number | undefined
  ): T => {
    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (e) {
      throw new DecodeError(`${resource.path} returned status ${response.status} with a non-JSON body`, slot, e);
    }
    const parsed = resource.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
      throw new DecodeError(`${resource.path} returned status ${response.status} with an unexpected payload (${where})`, slot, parsed.error);
    }
    return resource.extract(parsed.data);
  };

  const fetchWithRetry = async <S extends z.ZodTypeAny, T>(
    resource: Resource<S, T>,
    slot?: number
  ): Promise<T> => {
    const url = getUrl(config.baseUrl, resource.path);
    let lastError: TransportError | undefined;

    for (let attempt = 1; attempt <= config.retryCount; attempt++) {
      let response: HttpResponse;
      try {
        logger.debug(`[BeaconClient] Attempt ${attempt}: GET ${url}`);
        response = await httpGet(url);
      } catch (e) {
        lastError = new TransportError(url, e);
        logger.warn(`[BeaconClient] Attempt ${attempt}/${config.retryCount} failed: ${lastError.message}`, { slot });
        if (attempt < config.retryCount) {
          await wait(config.retryDelayMs);
        }
        continue;
      }

      // 404 on a slot means the proposer missed it; not an error
      if (response.status === HTTP_NOT_FOUND) {
        logger.debug(`[BeaconClient] ${resource.path} not found`, { slot });
        return resource.notFound;
      }
      return decode(resource, response, slot);
    }

    throw new RetryExhaustedError(config.retryCount, slot, lastError);
  };

  const getBlobSidecars = (slot: number): Promise<SidecarRecord[]> =>
    fetchWithRetry(
      {
        path: `eth/v1/beacon/blob_sidecars/${slot}`,
        schema: blobSidecarsResponseSchema,
        notFound: [],
        extract: (payload) => payload.data,
      },
      slot
    );

  const getBlockRoot = (slot: number): Promise<string> =>
    fetchWithRetry(
      {
        path: `eth/v1/beacon/headers/${slot}`,
        schema: blockHeaderResponseSchema,
        notFound: '',
        extract: (payload) => payload.data.root,
      },
      slot
    );

  const getHeadSlot = async (): Promise<number> => {
    const headers = await fetchWithRetry({
      path: 'eth/v1/beacon/headers',
      schema: blockHeadersResponseSchema,
      notFound: [],
      extract: (payload) => payload.data,
    });
    const head = headers[0];
    if (!head) {
      throw new HeadNotFoundError();
    }
    return Number(head.header.message.slot);
  };

  return {
    getBlobSidecars,
    getBlockRoot,
    getHeadSlot,
  };
};
