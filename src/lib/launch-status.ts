import type { LaunchEvent, StopReason } from "./orchestrator";

export function describeRegion(region: string): string {
  return region ? `region ${region}` : "any region";
}

export function formatLaunchEvent(event: LaunchEvent, instanceType: string): string {
  switch (event.type) {
    case "launching":
      return `Launching ${instanceType} in ${describeRegion(event.region)} (attempt ${event.attempt})...`;
    case "insufficient-capacity":
      return `No capacity for ${instanceType} in ${describeRegion(event.region)}. Waiting for capacity...`;
    case "polling":
      return `Checking capacity for ${instanceType} (poll ${event.poll})...`;
    case "no-capacity":
      return `Instance type ${instanceType} not available. Retrying in ${event.retryInSeconds} seconds...`;
    case "capacity-found":
      return `Capacity found in ${event.regions.join(", ")}. Launching in ${event.region}...`;
    case "succeeded":
      return `Launched ${event.instanceIds.length} instance(s).`;
    case "failed":
      return `Error launching instance (${event.code}): ${event.message}`;
    case "stopped":
      return `Stopped after ${event.attempts} launch attempt(s): ${formatStopReason(event.reason)}.`;
  }
}

export function formatStopReason(reason: StopReason): string {
  switch (reason) {
    case "aborted":
      return "interrupted";
    case "max-attempts":
      return "maximum attempts reached";
    case "timeout":
      return "timed out waiting for capacity";
  }
}
