import test from "node:test";
import assert from "node:assert/strict";
import { formatLaunchEvent } from "../src/lib/launch-status";

test("formatLaunchEvent describes an unpinned launch attempt", () => {
  assert.equal(
    formatLaunchEvent({ type: "launching", attempt: 1, region: "" }, "gpu_1x_a10"),
    "Launching gpu_1x_a10 in any region (attempt 1)..."
  );
});

test("formatLaunchEvent describes waiting for capacity", () => {
  assert.equal(
    formatLaunchEvent({ type: "no-capacity", poll: 3, retryInSeconds: 2 }, "gpu_1x_a10"),
    "Instance type gpu_1x_a10 not available. Retrying in 2 seconds..."
  );
  assert.equal(
    formatLaunchEvent({ type: "capacity-found", region: "us-east-1", regions: ["us-east-1", "us-west-1"] }, "gpu_1x_a10"),
    "Capacity found in us-east-1, us-west-1. Launching in us-east-1..."
  );
});

test("formatLaunchEvent describes a stopped loop", () => {
  assert.equal(
    formatLaunchEvent({ type: "stopped", reason: "max-attempts", attempts: 4 }, "gpu_1x_a10"),
    "Stopped after 4 launch attempt(s): maximum attempts reached."
  );
});
