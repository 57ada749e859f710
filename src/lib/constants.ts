export const CLI_NAME = "gpulaunch";

export const DEFAULT_API_BASE_URL = "https://cloud.lambdalabs.com/api/v1";
export const API_KEY_ENV = "LAMBDA_API_KEY";

export const READ_TIMEOUT_MS = 10_000;
export const LAUNCH_TIMEOUT_MS = 100_000;

export const DEFAULT_POLL_INTERVAL_SECONDS = 2;

export const MIN_QUANTITY = 1;
export const MAX_QUANTITY = 9;

export const INSUFFICIENT_CAPACITY_CODE = "insufficient-capacity";
export const TRANSPORT_ERROR_CODE = "transport-error";

export const DEFAULT_PYTHON_BIN = "python3";
export const NVIDIA_SMI_BIN = "nvidia-smi";
