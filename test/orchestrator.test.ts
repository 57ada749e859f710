import test from "node:test";
import assert from "node:assert/strict";
import {
  TransportError,
  type ApiResponse,
  type InstanceTypeInfo,
  type LaunchData,
  type LaunchPayload,
  type ProvisioningApi
} from "../src/lib/api";
import { CliError } from "../src/lib/errors";
import { createLaunchRequest } from "../src/lib/launch-request";
import {
  abortableSleep,
  isInsufficientCapacityCode,
  launch,
  pollCapacity,
  runWithRetry,
  selectRegion,
  toLaunchPayload,
  type LaunchEvent
} from "../src/lib/orchestrator";

type TypesResponse = ApiResponse<Record<string, InstanceTypeInfo>>;
type LaunchResponse = ApiResponse<LaunchData>;

const INSUFFICIENT: LaunchResponse = {
  error: { code: "instance-operations/launch/insufficient-capacity", message: "Not enough capacity" }
};

class FakeProvisioningApi implements ProvisioningApi {
  readonly launches: LaunchPayload[] = [];
  polls = 0;

  constructor(
    private readonly launchResponses: Array<LaunchResponse | Error>,
    private readonly pollResponses: Array<TypesResponse | Error> = []
  ) {}

  async listInstanceTypes(): Promise<TypesResponse> {
    this.polls += 1;
    const next = this.pollResponses.shift();
    if (!next) {
      throw new Error("unexpected capacity poll");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async launchInstances(payload: LaunchPayload): Promise<LaunchResponse> {
    this.launches.push(payload);
    const next = this.launchResponses.shift();
    if (!next) {
      throw new Error("unexpected launch");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

function capacity(instanceType: string, regions: string[]): TypesResponse {
  return {
    data: {
      [instanceType]: {
        name: instanceType,
        regionsWithCapacity: regions.map((name) => ({ name }))
      }
    }
  };
}

function recordingSleep(): { sleep: (ms: number) => Promise<void>; sleeps: number[] } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    }
  };
}

const request = createLaunchRequest({ instanceType: "gpu_1x_a10", sshKeyName: "laptop", quantity: 1 });

test("retries in the region that reports capacity and returns the launched instance ids", async () => {
  const api = new FakeProvisioningApi(
    [{ error: { code: "insufficient-capacity", message: "No capacity" } }, { data: { instance_ids: ["i-123"] } }],
    [capacity("gpu_1x_a10", ["us-east-1"])]
  );
  const { sleep, sleeps } = recordingSleep();

  const outcome = await runWithRetry(api, request, { sleep });

  assert.deepEqual(outcome, { status: "success", instanceIds: ["i-123"] });
  assert.equal(api.launches.length, 2);
  assert.equal("region_name" in api.launches[0], false);
  assert.equal(api.launches[1].region_name, "us-east-1");
  assert.equal(api.polls, 1);
  assert.deepEqual(sleeps, []);
});

test("returns a non-capacity launch error immediately without polling", async () => {
  const api = new FakeProvisioningApi([{ error: { code: "invalid-ssh-key", message: "SSH key not found" } }]);

  const outcome = await runWithRetry(api, request, { sleep: recordingSleep().sleep });

  assert.deepEqual(outcome, {
    status: "error",
    kind: "provider",
    code: "invalid-ssh-key",
    message: "SSH key not found"
  });
  assert.equal(api.polls, 0);
  assert.equal(api.launches.length, 1);
});

test("keeps polling without launching while no region has capacity", async () => {
  const api = new FakeProvisioningApi(
    [INSUFFICIENT, { data: { instance_ids: ["i-1", "i-2"] } }],
    [capacity("gpu_1x_a10", []), { data: {} }, capacity("gpu_1x_a10", ["us-west-1", "us-east-1"])]
  );
  const { sleep, sleeps } = recordingSleep();
  const events: LaunchEvent[] = [];

  const outcome = await runWithRetry(api, request, { sleep, onEvent: (event) => events.push(event) });

  assert.deepEqual(outcome, { status: "success", instanceIds: ["i-1", "i-2"] });
  assert.equal(api.launches.length, 2);
  assert.equal(api.launches[1].region_name, "us-west-1");
  assert.deepEqual(sleeps, [2000, 2000]);
  assert.deepEqual(
    events.map((event) => event.type),
    [
      "launching",
      "insufficient-capacity",
      "polling",
      "no-capacity",
      "polling",
      "no-capacity",
      "polling",
      "capacity-found",
      "launching",
      "succeeded"
    ]
  );
});

test("keeps a pinned region while it still reports capacity", async () => {
  const pinned = createLaunchRequest({ ...request, region: "us-east-1" });
  const api = new FakeProvisioningApi(
    [INSUFFICIENT, { data: { instance_ids: ["i-9"] } }],
    [capacity("gpu_1x_a10", ["us-west-1", "us-east-1"])]
  );

  await runWithRetry(api, pinned, { sleep: recordingSleep().sleep });

  assert.equal(api.launches[0].region_name, "us-east-1");
  assert.equal(api.launches[1].region_name, "us-east-1");
});

test("falls back to the first listed region when the pinned one has no capacity", async () => {
  const pinned = createLaunchRequest({ ...request, region: "us-east-1" });
  const api = new FakeProvisioningApi(
    [INSUFFICIENT, { data: { instance_ids: ["i-9"] } }],
    [capacity("gpu_1x_a10", ["us-west-1"])]
  );

  await runWithRetry(api, pinned, { sleep: recordingSleep().sleep });

  assert.equal(api.launches[1].region_name, "us-west-1");
});

test("waits the poll interval after a re-attempt is rejected for capacity", async () => {
  const api = new FakeProvisioningApi(
    [INSUFFICIENT, INSUFFICIENT, { data: { instance_ids: ["i-5"] } }],
    [capacity("gpu_1x_a10", ["us-east-1"]), capacity("gpu_1x_a10", ["us-east-1"])]
  );
  const { sleep, sleeps } = recordingSleep();

  const outcome = await runWithRetry(api, request, { sleep, pollIntervalSeconds: 5 });

  assert.deepEqual(outcome, { status: "success", instanceIds: ["i-5"] });
  assert.equal(api.launches.length, 3);
  assert.equal(api.polls, 2);
  assert.deepEqual(sleeps, [5000]);
});

test("returns a non-capacity error from a re-attempt", async () => {
  const api = new FakeProvisioningApi(
    [INSUFFICIENT, { error: { code: "quota-exceeded", message: "Quota exceeded" } }],
    [capacity("gpu_1x_a10", ["us-east-1"])]
  );

  const outcome = await runWithRetry(api, request, { sleep: recordingSleep().sleep });

  assert.deepEqual(outcome, { status: "error", kind: "provider", code: "quota-exceeded", message: "Quota exceeded" });
});

test("surfaces a transport failure during launch as a terminal outcome", async () => {
  const api = new FakeProvisioningApi([new TransportError("Request timed out", "https://example.test")]);

  const outcome = await runWithRetry(api, request, { sleep: recordingSleep().sleep });

  assert.deepEqual(outcome, {
    status: "error",
    kind: "transport",
    code: "transport-error",
    message: "Request timed out"
  });
  assert.equal(api.polls, 0);
});

test("stops when a capacity poll returns an API error", async () => {
  const api = new FakeProvisioningApi(
    [INSUFFICIENT],
    [{ error: { code: "global/invalid-api-key", message: "API key was invalid" } }]
  );

  const outcome = await runWithRetry(api, request, { sleep: recordingSleep().sleep });

  assert.deepEqual(outcome, {
    status: "error",
    kind: "provider",
    code: "global/invalid-api-key",
    message: "API key was invalid"
  });
  assert.equal(api.launches.length, 1);
});

test("maxAttempts bounds launch calls and returns the last capacity rejection", async () => {
  const api = new FakeProvisioningApi([INSUFFICIENT, INSUFFICIENT], [capacity("gpu_1x_a10", ["us-east-1"])]);
  const events: LaunchEvent[] = [];

  const outcome = await runWithRetry(api, request, {
    sleep: recordingSleep().sleep,
    maxAttempts: 2,
    onEvent: (event) => events.push(event)
  });

  assert.deepEqual(outcome, {
    status: "insufficient-capacity",
    code: "instance-operations/launch/insufficient-capacity",
    message: "Not enough capacity"
  });
  assert.equal(api.launches.length, 2);
  assert.equal(api.polls, 1);
  assert.deepEqual(events[events.length - 1], { type: "stopped", reason: "max-attempts", attempts: 2 });
});

test("an aborted signal stops the loop at the next poll", async () => {
  const controller = new AbortController();
  const api = new FakeProvisioningApi([INSUFFICIENT], [capacity("gpu_1x_a10", [])]);
  const events: LaunchEvent[] = [];

  const outcome = await runWithRetry(api, request, {
    signal: controller.signal,
    sleep: async () => controller.abort(),
    onEvent: (event) => events.push(event)
  });

  assert.equal(outcome.status, "insufficient-capacity");
  assert.equal(api.polls, 1);
  assert.deepEqual(events[events.length - 1], { type: "stopped", reason: "aborted", attempts: 1 });
});

test("timeoutMs stops the loop once the injected clock passes the deadline", async () => {
  let clock = 0;
  const api = new FakeProvisioningApi(
    [INSUFFICIENT],
    [capacity("gpu_1x_a10", []), capacity("gpu_1x_a10", []), capacity("gpu_1x_a10", [])]
  );

  const outcome = await runWithRetry(api, request, {
    timeoutMs: 5000,
    now: () => clock,
    sleep: async (ms) => {
      clock += ms;
    }
  });

  assert.equal(outcome.status, "insufficient-capacity");
  assert.equal(api.polls, 3);
  assert.equal(api.launches.length, 1);
});

test("launch refuses a second call through the same client while one is pending", async () => {
  let resolveLaunch: (response: LaunchResponse) => void = () => undefined;
  const api: ProvisioningApi = {
    listInstanceTypes: async () => ({ data: {} }),
    launchInstances: () =>
      new Promise<LaunchResponse>((resolve) => {
        resolveLaunch = resolve;
      })
  };

  const first = launch(api, request);
  await assert.rejects(launch(api, request), (error: unknown) => error instanceof CliError && error.kind === "runtime");

  resolveLaunch({ data: { instance_ids: ["i-1"] } });
  assert.deepEqual(await first, { status: "success", instanceIds: ["i-1"] });

  const again = launch(api, request);
  resolveLaunch({ data: { instance_ids: ["i-2"] } });
  assert.deepEqual(await again, { status: "success", instanceIds: ["i-2"] });
});

test("pollCapacity narrows the snapshot to the requested type", async () => {
  const api = new FakeProvisioningApi(
    [],
    [
      {
        data: {
          gpu_1x_a10: { name: "gpu_1x_a10", regionsWithCapacity: [{ name: "us-east-1" }, { name: "us-west-1" }] },
          gpu_8x_a100: { name: "gpu_8x_a100", regionsWithCapacity: [{ name: "us-east-1" }] }
        }
      },
      { data: {} }
    ]
  );

  assert.deepEqual(await pollCapacity(api, "gpu_1x_a10"), {
    gpu_1x_a10: { regionsWithCapacity: ["us-east-1", "us-west-1"] }
  });
  assert.deepEqual(await pollCapacity(api, "gpu_1x_a10"), {});
  assert.equal(api.launches.length, 0);
});

test("selectRegion prefers a pinned region, then the provider's first", () => {
  assert.equal(selectRegion(["us-west-1", "us-east-1"], ""), "us-west-1");
  assert.equal(selectRegion(["us-west-1", "us-east-1"], "us-east-1"), "us-east-1");
  assert.equal(selectRegion(["us-west-1"], "us-east-1"), "us-west-1");
  assert.equal(selectRegion([], ""), undefined);
});

test("isInsufficientCapacityCode accepts the bare and namespaced codes only", () => {
  assert.equal(isInsufficientCapacityCode("insufficient-capacity"), true);
  assert.equal(isInsufficientCapacityCode("instance-operations/launch/insufficient-capacity"), true);
  assert.equal(isInsufficientCapacityCode("invalid-ssh-key"), false);
  assert.equal(isInsufficientCapacityCode("not-insufficient-capacity"), false);
});

test("toLaunchPayload includes the file system and omits an empty region", () => {
  const withFileSystem = createLaunchRequest({ ...request, fileSystemName: "datasets", quantity: 3 });
  assert.deepEqual(toLaunchPayload(withFileSystem), {
    instance_type_name: "gpu_1x_a10",
    ssh_key_names: ["laptop"],
    file_system_names: ["datasets"],
    quantity: 3
  });
});

test("abortableSleep resolves early when its signal aborts mid-wait", async () => {
  const controller = new AbortController();
  const startedAt = Date.now();
  setTimeout(() => controller.abort(), 10);

  await abortableSleep(60_000, controller.signal);

  assert.ok(Date.now() - startedAt < 5_000);
});

test("abortableSleep returns at once for an already-aborted signal", async () => {
  const controller = new AbortController();
  controller.abort();
  const startedAt = Date.now();

  await abortableSleep(60_000, controller.signal);

  assert.ok(Date.now() - startedAt < 5_000);
});

test("abortableSleep waits out a short interval without a signal", async () => {
  const startedAt = Date.now();
  await abortableSleep(20);
  assert.ok(Date.now() - startedAt >= 15);
});
