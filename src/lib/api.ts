import { DEFAULT_API_BASE_URL, LAUNCH_TIMEOUT_MS, READ_TIMEOUT_MS } from "./constants";
import { isRecord } from "./utils";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiErrorBody {
  code: string;
  message: string;
  suggestion?: string;
}

export type ApiResponse<T> = { data: T } | { error: ApiErrorBody };

export interface RegionInfo {
  name: string;
  description?: string;
}

export interface InstanceTypeInfo {
  name: string;
  description?: string;
  priceCentsPerHour?: number;
  regionsWithCapacity: RegionInfo[];
}

export interface LaunchPayload {
  region_name?: string;
  instance_type_name: string;
  ssh_key_names: [string];
  file_system_names: string[];
  quantity: number;
}

export interface LaunchData {
  instance_ids: string[];
}

export interface ProvisioningApi {
  listInstanceTypes(): Promise<ApiResponse<Record<string, InstanceTypeInfo>>>;
  launchInstances(payload: LaunchPayload): Promise<ApiResponse<LaunchData>>;
}

export interface CloudApiClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
  readTimeoutMs?: number;
  launchTimeoutMs?: number;
  onRequest?: (method: string, url: string) => void;
}

export class ApiError extends Error {
  readonly code: string;
  readonly suggestion?: string;
  readonly status?: number;

  constructor(body: ApiErrorBody, status?: number) {
    super(body.message);
    this.name = "ApiError";
    this.code = body.code;
    this.suggestion = body.suggestion;
    this.status = status;
  }
}

export class TransportError extends Error {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.url = url;
  }
}

export class CloudApiClient implements ProvisioningApi {
  private readonly authorization: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly readTimeoutMs: number;
  private readonly launchTimeoutMs: number;
  private readonly onRequest?: (method: string, url: string) => void;

  constructor(options: CloudApiClientOptions) {
    this.authorization = basicAuthorization(options.apiKey);
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.readTimeoutMs = options.readTimeoutMs ?? READ_TIMEOUT_MS;
    this.launchTimeoutMs = options.launchTimeoutMs ?? LAUNCH_TIMEOUT_MS;
    this.onRequest = options.onRequest;
  }

  async listInstanceTypes(): Promise<ApiResponse<Record<string, InstanceTypeInfo>>> {
    const response = await this.request("GET", "/instance-types", this.readTimeoutMs);
    if ("error" in response) {
      return response;
    }
    return { data: parseInstanceTypes(response.data) };
  }

  async listSshKeys(): Promise<string[]> {
    return await this.listNames("/ssh-keys");
  }

  async listFileSystems(): Promise<string[]> {
    return await this.listNames("/file-systems");
  }

  async launchInstances(payload: LaunchPayload): Promise<ApiResponse<LaunchData>> {
    const response = await this.request("POST", "/instance-operations/launch", this.launchTimeoutMs, payload);
    if ("error" in response) {
      return response;
    }
    return { data: { instance_ids: parseInstanceIds(response.data) } };
  }

  private async listNames(path: string): Promise<string[]> {
    const response = await this.request("GET", path, this.readTimeoutMs);
    if ("error" in response) {
      throw new ApiError(response.error);
    }
    if (!Array.isArray(response.data)) {
      throw new TransportError(`Malformed response from ${path}: expected a list.`, this.baseUrl + path);
    }
    return response.data
      .map((entry) => (isRecord(entry) && typeof entry.name === "string" ? entry.name : undefined))
      .filter((name): name is string => Boolean(name));
  }

  private async request(method: "GET" | "POST", path: string, timeoutMs: number, body?: unknown): Promise<ApiResponse<unknown>> {
    const url = `${this.baseUrl}${path}`;
    this.onRequest?.(method, url);

    const headers: Record<string, string> = {
      Authorization: this.authorization,
      Accept: "application/json"
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    // The timeout signal stays armed while the body streams in, so both reads share one catch.
    let status: number;
    let raw: string;
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs)
      });
      status = response.status;
      raw = await response.text();
    } catch (error) {
      throw toTransportError(error, method, url, timeoutMs);
    }
    return parseEnvelope(raw, url, status);
  }
}

function toTransportError(error: unknown, method: string, url: string, timeoutMs: number): TransportError {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new TransportError(`Request timed out after ${timeoutMs}ms: ${method} ${url}`, url, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request failed: ${method} ${url}: ${reason}`, url, { cause: error });
}

/**
 * Checks a key by listing instance types. Resolves to `true`, or to the message to show
 * before asking again.
 */
export async function verifyApiKey(api: ProvisioningApi): Promise<true | string> {
  let response: ApiResponse<Record<string, InstanceTypeInfo>>;
  try {
    response = await api.listInstanceTypes();
  } catch (error) {
    if (error instanceof TransportError) {
      return error.message;
    }
    throw error;
  }

  if ("error" in response || Object.keys(response.data).length === 0) {
    return "API key is invalid or has no permissions.";
  }
  return true;
}

export function parseEnvelope(raw: string, url: string, status?: number): ApiResponse<unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const suffix = typeof status === "number" ? ` (HTTP ${status})` : "";
    throw new TransportError(`Malformed response from ${url}${suffix}: body is not JSON.`, url, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new TransportError(`Malformed response from ${url}: expected a JSON object.`, url);
  }

  if ("data" in parsed) {
    return { data: parsed.data };
  }

  const error = parsed.error;
  if (isRecord(error)) {
    return {
      error: {
        code: typeof error.code === "string" ? error.code : "unknown",
        message: typeof error.message === "string" ? error.message : "Unknown error",
        suggestion: typeof error.suggestion === "string" ? error.suggestion : undefined
      }
    };
  }

  throw new TransportError(`Malformed response from ${url}: neither data nor error present.`, url);
}

export function basicAuthorization(apiKey: string): string {
  return `Basic ${Buffer.from(`${apiKey}:`).toString("base64")}`;
}

function parseInstanceTypes(data: unknown): Record<string, InstanceTypeInfo> {
  const result: Record<string, InstanceTypeInfo> = {};
  if (!isRecord(data)) {
    return result;
  }

  for (const [key, value] of Object.entries(data)) {
    if (!isRecord(value)) {
      continue;
    }
    const details: Record<string, unknown> = isRecord(value.instance_type) ? value.instance_type : {};
    const regions = Array.isArray(value.regions_with_capacity_available) ? value.regions_with_capacity_available : [];
    result[key] = {
      name: typeof details.name === "string" ? details.name : key,
      description: typeof details.description === "string" ? details.description : undefined,
      priceCentsPerHour: typeof details.price_cents_per_hour === "number" ? details.price_cents_per_hour : undefined,
      regionsWithCapacity: regions
        .filter(isRecord)
        .filter((region) => typeof region.name === "string")
        .map((region) => ({
          name: String(region.name),
          description: typeof region.description === "string" ? region.description : undefined
        }))
    };
  }
  return result;
}

function parseInstanceIds(data: unknown): string[] {
  if (!isRecord(data) || !Array.isArray(data.instance_ids)) {
    return [];
  }
  return data.instance_ids.filter((id): id is string => typeof id === "string");
}
