export interface LaunchRequest {
  readonly region: string;
  readonly instanceType: string;
  readonly sshKeyName: string;
  readonly fileSystemName?: string;
  readonly quantity: number;
}

export interface RegionCapacity {
  regionsWithCapacity: string[];
}

export type CapacitySnapshot = Record<string, RegionCapacity>;

export type LaunchErrorKind = "provider" | "transport";

export type LaunchOutcome =
  | { status: "success"; instanceIds: string[] }
  | { status: "insufficient-capacity"; code: string; message: string }
  | { status: "error"; kind: LaunchErrorKind; code: string; message: string };

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; message: string };
