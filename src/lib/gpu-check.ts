import fs from "node:fs";
import path from "node:path";
import { NVIDIA_SMI_BIN } from "./constants";
import { CliError } from "./errors";
import { CommandError, runCommand, type CommandRunner, type RunResult } from "./exec";
import { isRecord, parseMaybeNumber } from "./utils";

export interface GpuCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
}

export interface GpuCheckReport {
  checks: GpuCheck[];
  ok: boolean;
  summary: string;
}

export interface SystemGpuCount {
  count: number;
  reason?: string;
}

export interface TorchDevice {
  index: number;
  name: string;
  ok: boolean;
  error?: string;
}

export interface TorchProbe {
  deviceCount: number;
  devices: TorchDevice[];
}

export interface GpuCheckOptions {
  pythonBin: string;
  run?: CommandRunner;
  scriptPath?: string;
}

const NO_GPUS_SUMMARY = "No GPUs available. Make sure NVIDIA drivers are properly installed.";
const MISMATCH_SUMMARY = "Not all GPUs are being utilized by PyTorch.";
const ALL_UTILIZED_SUMMARY = "All GPUs are utilized.";
const TORCH_HINT = "Install PyTorch with CUDA support, or point GPULAUNCH_PYTHON at an interpreter that has it.";
const SMI_TIMEOUT_MS = 15_000;
const PROBE_TIMEOUT_MS = 300_000;

export function parseNvidiaSmiList(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => /^GPU \d+:/.test(line));
}

export async function countSystemGpus(run: CommandRunner = runCommand): Promise<SystemGpuCount> {
  let result: RunResult;
  try {
    result = await run(NVIDIA_SMI_BIN, ["-L"], { allowNonZeroExit: true, timeoutMs: SMI_TIMEOUT_MS });
  } catch (error) {
    if (!(error instanceof CommandError)) {
      throw error;
    }
    return {
      count: 0,
      reason: error.failure === "not-found" ? `${NVIDIA_SMI_BIN} is not installed` : error.message
    };
  }

  if (result.exitCode !== 0) {
    return { count: 0, reason: result.stderr || `${NVIDIA_SMI_BIN} exited with code ${result.exitCode}` };
  }
  return { count: parseNvidiaSmiList(result.stdout).length };
}

export function parseTorchProbe(stdout: string): TorchProbe {
  const lastLine = stdout.split("\n").map((line) => line.trim()).filter(Boolean).pop();
  let parsed: unknown;
  try {
    parsed = lastLine ? JSON.parse(lastLine) : undefined;
  } catch {
    parsed = undefined;
  }

  const deviceCount = isRecord(parsed) ? parseMaybeNumber(parsed.device_count) : undefined;
  if (!isRecord(parsed) || typeof deviceCount !== "number") {
    throw new CliError({
      kind: "runtime",
      message: "Unexpected output from the PyTorch probe.",
      detail: stdout || undefined
    });
  }

  const rawDevices = Array.isArray(parsed.devices) ? parsed.devices : [];
  const devices = rawDevices.filter(isRecord).map((device, position): TorchDevice => ({
    index: parseMaybeNumber(device.index) ?? position,
    name: typeof device.name === "string" ? device.name : "unknown",
    ok: device.ok === true,
    error: typeof device.error === "string" ? device.error : undefined
  }));

  return { deviceCount, devices };
}

export async function probeTorchRuntime(
  pythonBin: string,
  run: CommandRunner = runCommand,
  scriptPath: string = getProbeScriptPath()
): Promise<TorchProbe> {
  let result: RunResult;
  try {
    result = await run(pythonBin, [scriptPath], { timeoutMs: PROBE_TIMEOUT_MS });
  } catch (error) {
    if (error instanceof CommandError) {
      throw describeProbeFailure(error);
    }
    throw error;
  }
  return parseTorchProbe(result.stdout);
}

function describeProbeFailure(error: CommandError): CliError {
  switch (error.failure) {
    case "not-found":
      return new CliError({
        kind: "dependency",
        message: `Python interpreter not found: ${error.binary}`,
        hint: "Set GPULAUNCH_PYTHON to an interpreter that has PyTorch installed."
      });
    case "timeout":
      return new CliError({
        kind: "runtime",
        message: `PyTorch probe did not finish within ${PROBE_TIMEOUT_MS / 1000}s.`,
        hint: "A GPU may be hung; check nvidia-smi for stuck processes."
      });
    case "exit": {
      // The last stderr line of a Python traceback names the exception.
      const reason = error.stderr.split("\n").map((line) => line.trim()).filter(Boolean).pop();
      return new CliError({
        kind: "dependency",
        message: reason
          ? `PyTorch probe exited with code ${error.exitCode ?? "unknown"}: ${reason}`
          : `PyTorch probe exited with code ${error.exitCode ?? "unknown"}.`,
        hint: TORCH_HINT,
        detail: error.stderr || undefined
      });
    }
  }
}

export async function runGpuCheck(options: GpuCheckOptions): Promise<GpuCheckReport> {
  const run = options.run ?? runCommand;
  const checks: GpuCheck[] = [];

  const system = await countSystemGpus(run);
  checks.push({
    key: "system-gpus",
    ok: system.count > 0,
    message: system.reason
      ? `Number of available GPUs: ${system.count} (${system.reason})`
      : `Number of available GPUs: ${system.count}`,
    fix: system.count > 0 ? undefined : "Make sure NVIDIA drivers are properly installed."
  });
  if (system.count === 0) {
    return { checks, ok: false, summary: NO_GPUS_SUMMARY };
  }

  let probe: TorchProbe;
  try {
    probe = await probeTorchRuntime(options.pythonBin, run, options.scriptPath);
  } catch (error) {
    if (!(error instanceof CliError)) {
      throw error;
    }
    checks.push({ key: "runtime-gpus", ok: false, message: error.message, fix: error.hint });
    return { checks, ok: false, summary: error.message };
  }

  checks.push({
    key: "runtime-gpus",
    ok: probe.deviceCount === system.count,
    message: `Number of available GPUs being used by PyTorch: ${probe.deviceCount}`
  });
  if (probe.deviceCount !== system.count) {
    return { checks, ok: false, summary: MISMATCH_SUMMARY };
  }

  for (const device of probe.devices) {
    checks.push({
      key: `gpu-${device.index}`,
      ok: device.ok,
      message: device.ok
        ? `Using GPU ${device.index}: ${device.name}`
        : `GPU ${device.index} is not being utilized correctly.`,
      fix: device.error
    });
  }

  const failed = probe.devices.find((device) => !device.ok);
  if (failed) {
    return { checks, ok: false, summary: `GPU ${failed.index} is not being utilized correctly.` };
  }
  return { checks, ok: true, summary: ALL_UTILIZED_SUMMARY };
}

export function getProbeScriptPath(): string {
  const candidates = [
    path.resolve(__dirname, "../../scripts/torch_probe.py"),
    path.resolve(__dirname, "../scripts/torch_probe.py"),
    path.resolve(process.cwd(), "scripts/torch_probe.py")
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new CliError({
    kind: "not_found",
    message: "Bundled PyTorch probe script not found."
  });
}
