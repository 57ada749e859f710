import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CommandError, runCommand, type CommandRunner, type RunResult } from "./exec";
import { isRecord } from "./utils";

export const REPORT_DIR_NAME = "gpulaunch-bug-report";
export const DEFAULT_BUG_REPORT_FILE = `${REPORT_DIR_NAME}.tar.gz`;

const COLLECT_TIMEOUT_MS = 60_000;
const ARCHIVE_TIMEOUT_MS = 300_000;

export interface ReportCommand {
  /** Path inside the report directory. */
  file: string;
  command: string;
  args?: string[];
  /** Needs root; run through `sudo -n` when sudo is enabled. */
  privileged?: boolean;
  env?: Record<string, string>;
  /** Written instead when the command prints nothing. */
  emptyNote?: string;
  /** The command writes `file` into its working directory itself; stdout is discarded. */
  writesOwnFile?: boolean;
  timeoutMs?: number;
}

export interface ReportFile {
  file: string;
  source: string;
}

export interface SkippedItem {
  file: string;
  reason: string;
}

export interface BugReportResult {
  archivePath: string;
  collected: string[];
  skipped: SkippedItem[];
}

export interface BugReportOptions {
  outputPath: string;
  sudo?: boolean;
  run?: CommandRunner;
  commands?: readonly ReportCommand[];
  files?: readonly ReportFile[];
  tmpRoot?: string;
  onProgress?: (message: string) => void;
}

const GPU_QUERY_FORMAT = "--format=csv";

export const REPORT_COMMANDS: readonly ReportCommand[] = [
  { file: "nvidia-smi.txt", command: "nvidia-smi" },
  {
    file: "nvidia-bug-report.log.gz",
    command: "nvidia-bug-report.sh",
    privileged: true,
    writesOwnFile: true,
    timeoutMs: 600_000
  },
  {
    file: "gpu-memory-errors/remapped-memory.txt",
    command: "nvidia-smi",
    args: [
      "--query-remapped-rows=gpu_bus_id,gpu_uuid,remapped_rows.correctable,remapped_rows.uncorrectable,remapped_rows.pending,remapped_rows.failure",
      GPU_QUERY_FORMAT
    ]
  },
  {
    file: "gpu-memory-errors/ecc-errors.txt",
    command: "nvidia-smi",
    args: [
      "--query-gpu=index,pci.bus_id,uuid,ecc.errors.corrected.volatile.dram,ecc.errors.corrected.volatile.sram",
      GPU_QUERY_FORMAT
    ]
  },
  {
    file: "gpu-memory-errors/uncorrected-ecc-errors.txt",
    command: "nvidia-smi",
    args: [
      "--query-gpu=index,pci.bus_id,uuid,ecc.errors.uncorrected.aggregate.dram,ecc.errors.uncorrected.aggregate.sram",
      GPU_QUERY_FORMAT
    ]
  },
  { file: "system-logs/dmesg-errors.txt", command: "dmesg", args: ["-Tl", "err"], privileged: true },
  { file: "system-logs/journalctl.txt", command: "journalctl", args: ["--no-pager"], privileged: true },
  {
    file: "ibstat.txt",
    command: "ibstat",
    emptyNote: "No InfiniBand data available. This machine may not have InfiniBand."
  },
  {
    file: "bmc-info/ipmi-elist.txt",
    command: "ipmitool",
    args: ["sel", "elist"],
    privileged: true,
    emptyNote: "No IPMI ELIST data available. This machine may not have IPMI."
  },
  { file: "sensors.txt", command: "sensors" },
  { file: "hw-list.txt", command: "lshw", privileged: true },
  { file: "lsmod.txt", command: "lsmod" },
  {
    file: "drives-and-storage/lsblk.txt",
    command: "lsblk",
    args: ["-o", "NAME,MAJ:MIN,RM,SIZE,RO,FSTYPE,LABEL,UUID,TYPE,MOUNTPOINT"]
  },
  { file: "drives-and-storage/df.txt", command: "df", args: ["-hTP"] },
  { file: "repos-and-packages/dpkg.txt", command: "dpkg", args: ["-l"] },
  {
    file: "repos-and-packages/pip-list.txt",
    command: "pip",
    args: ["-v", "list"],
    env: { PIP_DISABLE_PIP_VERSION_CHECK: "1" }
  },
  { file: "sysctl-all.txt", command: "sysctl", args: ["-a"], privileged: true },
  { file: "systemctl-services.txt", command: "systemctl", args: ["--type=service", "--no-pager"] },
  { file: "networking/ip-addr.txt", command: "ip", args: ["addr"] },
  {
    file: "networking/ss.txt",
    command: "ss",
    args: ["--tcp", "--udp", "--listening", "--numeric", "--process"],
    privileged: true
  },
  { file: "uptime.txt", command: "uptime" }
];

export const REPORT_FILES: readonly ReportFile[] = [
  { file: "system-logs/kern.log", source: "/var/log/kern.log" },
  { file: "system-logs/syslog", source: "/var/log/syslog" },
  { file: "grub/proc_cmdline.txt", source: "/proc/cmdline" },
  { file: "grub/grub.txt", source: "/etc/default/grub" },
  { file: "drives-and-storage/fstab.txt", source: "/etc/fstab" },
  { file: "drives-and-storage/mounts.txt", source: "/proc/mounts" }
];

/**
 * Runs every collector into a scratch directory and packs it with `tar -z`. A collector
 * that is missing or fails is listed as skipped; only the archive step is fatal. The
 * scratch directory is removed either way.
 */
export async function collectBugReport(options: BugReportOptions): Promise<BugReportResult> {
  const run = options.run ?? runCommand;
  const progress = options.onProgress ?? (() => undefined);
  const workDir = fs.mkdtempSync(path.join(options.tmpRoot ?? os.tmpdir(), "gpulaunch-"));
  const reportDir = path.join(workDir, REPORT_DIR_NAME);
  const collected: string[] = [];
  const skipped: SkippedItem[] = [];

  try {
    fs.mkdirSync(reportDir, { recursive: true });

    for (const entry of options.commands ?? REPORT_COMMANDS) {
      progress(`Collecting ${entry.file}...`);
      const outcome = await collectCommand(run, entry, reportDir, options.sudo === true);
      if (outcome === true) {
        collected.push(entry.file);
      } else {
        skipped.push({ file: entry.file, reason: outcome });
      }
    }

    for (const entry of options.files ?? REPORT_FILES) {
      progress(`Copying ${entry.source}...`);
      const outcome = copyReportFile(entry, reportDir);
      if (outcome === true) {
        collected.push(entry.file);
      } else {
        skipped.push({ file: entry.file, reason: outcome });
      }
    }

    const archivePath = path.resolve(options.outputPath);
    progress(`Compressing into ${archivePath}...`);
    await run("tar", ["-zcf", archivePath, REPORT_DIR_NAME], { cwd: workDir, timeoutMs: ARCHIVE_TIMEOUT_MS });
    return { archivePath, collected, skipped };
  } finally {
    fs.rmSync(workDir, { recursive: true, force: true });
  }
}

async function collectCommand(
  run: CommandRunner,
  entry: ReportCommand,
  reportDir: string,
  sudo: boolean
): Promise<true | string> {
  const target = path.join(reportDir, entry.file);
  fs.mkdirSync(path.dirname(target), { recursive: true });

  const argv = [entry.command, ...(entry.args ?? [])];
  const [binary, ...args] = entry.privileged && sudo ? ["sudo", "-n", ...argv] : argv;

  let result: RunResult;
  try {
    result = await run(binary, args, {
      cwd: entry.writesOwnFile ? path.dirname(target) : undefined,
      env: entry.env,
      timeoutMs: entry.timeoutMs ?? COLLECT_TIMEOUT_MS,
      allowNonZeroExit: true
    });
  } catch (error) {
    if (!(error instanceof CommandError)) {
      throw error;
    }
    return error.failure === "not-found" ? `${error.binary} is not installed` : error.message;
  }

  if (entry.writesOwnFile) {
    return fs.existsSync(target) ? true : describeExit(result, "no file written");
  }

  if (!result.stdout) {
    if (entry.emptyNote) {
      fs.writeFileSync(target, `${entry.emptyNote}\n`);
      return true;
    }
    return describeExit(result, "no output");
  }

  fs.writeFileSync(target, `${result.stdout}\n`);
  return true;
}

function describeExit(result: RunResult, fallback: string): string {
  if (result.exitCode === 0) {
    return fallback;
  }
  const reason = result.stderr.split("\n").map((line) => line.trim()).filter(Boolean).pop();
  return reason ? `exited with code ${result.exitCode}: ${reason}` : `exited with code ${result.exitCode}`;
}

function copyReportFile(entry: ReportFile, reportDir: string): true | string {
  const target = path.join(reportDir, entry.file);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  try {
    // procfs reports a size of zero, so read the contents instead of copying the file.
    fs.writeFileSync(target, fs.readFileSync(entry.source));
    return true;
  } catch (error) {
    const code = isRecord(error) && typeof error.code === "string" ? error.code : undefined;
    if (code === "ENOENT") {
      return `${entry.source} does not exist`;
    }
    if (code === "EACCES" || code === "EPERM") {
      return `${entry.source} is not readable`;
    }
    throw error;
  }
}
