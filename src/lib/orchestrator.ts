import { ApiError, TransportError, type LaunchPayload, type ProvisioningApi } from "./api";
import { DEFAULT_POLL_INTERVAL_SECONDS, INSUFFICIENT_CAPACITY_CODE, TRANSPORT_ERROR_CODE } from "./constants";
import { CliError } from "./errors";
import type { CapacitySnapshot, LaunchOutcome, LaunchRequest } from "./types";

type InsufficientCapacityOutcome = Extract<LaunchOutcome, { status: "insufficient-capacity" }>;
type SuccessOutcome = Extract<LaunchOutcome, { status: "success" }>;
type ErrorOutcome = Extract<LaunchOutcome, { status: "error" }>;

export type StopReason = "max-attempts" | "timeout" | "aborted";

export type LaunchEvent =
  | { type: "launching"; attempt: number; region: string }
  | { type: "insufficient-capacity"; attempt: number; region: string; message: string }
  | { type: "polling"; poll: number }
  | { type: "no-capacity"; poll: number; retryInSeconds: number }
  | { type: "capacity-found"; region: string; regions: string[] }
  | { type: "succeeded"; instanceIds: string[] }
  | { type: "failed"; code: string; message: string }
  | { type: "stopped"; reason: StopReason; attempts: number };

export interface RetryOptions {
  pollIntervalSeconds?: number;
  /** Upper bound on launch calls. Unbounded when omitted. */
  maxAttempts?: number;
  /** Upper bound on total wall-clock time. Unbounded when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  onEvent?: (event: LaunchEvent) => void;
}

type RetryState =
  | { kind: "launching"; region: string }
  | { kind: "polling"; last: InsufficientCapacityOutcome }
  | { kind: "succeeded"; outcome: SuccessOutcome }
  | { kind: "failed"; outcome: ErrorOutcome };

const launchesInFlight = new WeakSet<ProvisioningApi>();

export function isInsufficientCapacityCode(code: string): boolean {
  return code === INSUFFICIENT_CAPACITY_CODE || code.endsWith(`/${INSUFFICIENT_CAPACITY_CODE}`);
}

export function toLaunchPayload(request: LaunchRequest): LaunchPayload {
  return {
    ...(request.region ? { region_name: request.region } : {}),
    instance_type_name: request.instanceType,
    ssh_key_names: [request.sshKeyName],
    file_system_names: request.fileSystemName ? [request.fileSystemName] : [],
    quantity: request.quantity
  };
}

/**
 * Issues one launch call and classifies the response. API and transport failures come back
 * as outcomes. Throws only if a launch through the same client is still pending.
 */
export async function launch(api: ProvisioningApi, request: LaunchRequest): Promise<LaunchOutcome> {
  if (launchesInFlight.has(api)) {
    throw new CliError({
      kind: "runtime",
      message: "A launch request is already in flight; refusing to issue another until it resolves."
    });
  }

  launchesInFlight.add(api);
  try {
    const response = await api.launchInstances(toLaunchPayload(request));
    if ("data" in response) {
      return { status: "success", instanceIds: response.data.instance_ids };
    }
    if (isInsufficientCapacityCode(response.error.code)) {
      return { status: "insufficient-capacity", code: response.error.code, message: response.error.message };
    }
    return { status: "error", kind: "provider", code: response.error.code, message: response.error.message };
  } catch (error) {
    return toErrorOutcome(error);
  } finally {
    launchesInFlight.delete(api);
  }
}

export async function pollCapacity(api: ProvisioningApi, instanceType: string): Promise<CapacitySnapshot> {
  const response = await api.listInstanceTypes();
  if ("error" in response) {
    throw new ApiError(response.error);
  }

  const entry = response.data[instanceType];
  if (!entry) {
    return {};
  }
  return {
    [instanceType]: {
      regionsWithCapacity: entry.regionsWithCapacity.map((region) => region.name)
    }
  };
}

/** A pinned region wins while it still has capacity; otherwise the provider's first listed region. */
export function selectRegion(regionsWithCapacity: readonly string[], pinnedRegion: string): string | undefined {
  if (pinnedRegion && regionsWithCapacity.includes(pinnedRegion)) {
    return pinnedRegion;
  }
  return regionsWithCapacity[0];
}

export async function runWithRetry(
  api: ProvisioningApi,
  request: LaunchRequest,
  options: RetryOptions = {}
): Promise<LaunchOutcome> {
  const pollIntervalMs = (options.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS) * 1000;
  const sleep = options.sleep ?? abortableSleep;
  const now = options.now ?? Date.now;
  const emit = options.onEvent ?? (() => undefined);
  const startedAt = now();

  let attempts = 0;
  let polls = 0;
  let state: RetryState = { kind: "launching", region: request.region };

  const stopReason = (): StopReason | undefined => {
    if (options.signal?.aborted) {
      return "aborted";
    }
    if (typeof options.maxAttempts === "number" && attempts >= options.maxAttempts) {
      return "max-attempts";
    }
    if (typeof options.timeoutMs === "number" && now() - startedAt >= options.timeoutMs) {
      return "timeout";
    }
    return undefined;
  };

  while (true) {
    switch (state.kind) {
      case "succeeded":
        emit({ type: "succeeded", instanceIds: state.outcome.instanceIds });
        return state.outcome;

      case "failed":
        emit({ type: "failed", code: state.outcome.code, message: state.outcome.message });
        return state.outcome;

      case "launching": {
        attempts += 1;
        const region = state.region;
        emit({ type: "launching", attempt: attempts, region });
        const outcome = await launch(api, { ...request, region });

        if (outcome.status === "success") {
          state = { kind: "succeeded", outcome };
          break;
        }
        if (outcome.status === "error") {
          state = { kind: "failed", outcome };
          break;
        }

        emit({ type: "insufficient-capacity", attempt: attempts, region, message: outcome.message });
        // The first rejection goes straight to polling; later ones wait out the interval first.
        if (attempts > 1) {
          await sleep(pollIntervalMs, options.signal);
        }
        state = { kind: "polling", last: outcome };
        break;
      }

      case "polling": {
        const reason = stopReason();
        if (reason) {
          emit({ type: "stopped", reason, attempts });
          return state.last;
        }

        polls += 1;
        emit({ type: "polling", poll: polls });

        let snapshot: CapacitySnapshot;
        try {
          snapshot = await pollCapacity(api, request.instanceType);
        } catch (error) {
          state = { kind: "failed", outcome: toErrorOutcome(error) };
          break;
        }

        const regions = snapshot[request.instanceType]?.regionsWithCapacity ?? [];
        const region = selectRegion(regions, request.region);
        if (!region) {
          emit({ type: "no-capacity", poll: polls, retryInSeconds: pollIntervalMs / 1000 });
          await sleep(pollIntervalMs, options.signal);
          break;
        }

        emit({ type: "capacity-found", region, regions });
        state = { kind: "launching", region };
        break;
      }
    }
  }
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function toErrorOutcome(error: unknown): ErrorOutcome {
  if (error instanceof ApiError) {
    return { status: "error", kind: "provider", code: error.code, message: error.message };
  }
  if (error instanceof TransportError) {
    return { status: "error", kind: "transport", code: TRANSPORT_ERROR_CODE, message: error.message };
  }
  throw error;
}
