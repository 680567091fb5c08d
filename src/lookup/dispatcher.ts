/**
 * Query dispatcher: validates a lookup, fires both saved queries of its kind
 * at once and waits for both.
 *
 * Results come back in template order whatever order the calls finish in.
 * One failed call is tolerated; two are not. Aborting the parent signal or
 * passing the deadline aborts both calls and fails the whole dispatch.
 */

import type { QueryTemplate, QueryTemplateSet } from "../domain/types.js";
import {
  cancelledError,
  isLookupError,
  networkError,
  partialUpstreamFailure,
  timeoutError,
  upstreamUnavailableError,
  validationError,
  LookupError,
} from "../domain/errors.js";
import { formatIssues, parseSearchRequest } from "../domain/validation.js";
import type { Logger } from "../logger.js";
import type { QueryRun, RawResult, SavedQueryClient } from "./types.js";

export interface QueryDispatcherConfig {
  client: SavedQueryClient;
  templates: QueryTemplateSet;
  logger: Logger;
  /** Deadline for the whole dispatch; unset means no deadline beyond each call's own timeout */
  timeoutMs?: number;
}

export interface DispatchOptions {
  signal?: AbortSignal;
  /** Overrides the configured deadline */
  timeoutMs?: number;
}

export class QueryDispatcher {
  constructor(private readonly config: QueryDispatcherConfig) {}

  async dispatch(
    term: string,
    kind: string,
    options: DispatchOptions = {}
  ): Promise<readonly [QueryRun, QueryRun]> {
    const parsed = parseSearchRequest({ term, kind });
    if (!parsed.success) {
      throw validationError(formatIssues(parsed.error), parsed.error);
    }
    const request = parsed.data;
    const operation = `${request.kind} lookup for "${request.term}"`;
    if (options.signal?.aborted) {
      throw cancelledError(operation);
    }

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(cancelledError(operation));
    options.signal?.addEventListener("abort", onParentAbort, { once: true });
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const deadline =
      timeoutMs !== undefined
        ? setTimeout(() => controller.abort(timeoutError(operation)), timeoutMs)
        : undefined;

    // Settles the dispatch on abort even when a client ignores its signal
    let rejectAborted: (reason: unknown) => void = () => undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      rejectAborted = reject;
    });
    const onAbort = () => rejectAborted(abortReason(controller.signal, operation));
    controller.signal.addEventListener("abort", onAbort, { once: true });

    const run = async (template: QueryTemplate): Promise<QueryRun> => {
      const result = await this.config.client
        .execute(template, request.term, { signal: controller.signal })
        .catch((err: unknown): RawResult => ({ ok: false, error: toLookupError(err, template) }));
      return { template, result };
    };

    try {
      const [first, second] = this.config.templates[request.kind];
      const runs = await Promise.race([Promise.all([run(first), run(second)] as const), aborted]);

      if (controller.signal.aborted) {
        throw abortReason(controller.signal, operation);
      }

      const failures = runs.flatMap((r) => (r.result.ok ? [] : [r.result.error]));
      if (failures.length === runs.length) {
        throw upstreamUnavailableError(failures);
      }
      for (const failure of failures) {
        const warning = partialUpstreamFailure(failure);
        this.config.logger.warn(
          { code: warning.code, query: failure.details.query, err: failure.toJSON() },
          warning.message
        );
      }
      return runs;
    } finally {
      clearTimeout(deadline);
      controller.signal.removeEventListener("abort", onAbort);
      options.signal?.removeEventListener("abort", onParentAbort);
    }
  }
}

function abortReason(signal: AbortSignal, operation: string): LookupError {
  const reason: unknown = signal.reason;
  return isLookupError(reason) ? reason : cancelledError(operation);
}

function toLookupError(err: unknown, template: QueryTemplate): LookupError {
  if (err instanceof LookupError) return err;
  return networkError(
    err instanceof Error ? err.message : `Saved query ${template.queryName} failed`,
    err,
    template.queryName
  );
}
