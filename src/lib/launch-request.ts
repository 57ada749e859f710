import { getInstanceTypes, getRegionsForInstanceType } from "./catalog";
import { MAX_QUANTITY, MIN_QUANTITY } from "./constants";
import { CliError } from "./errors";
import type { LaunchRequest, ValidationResult } from "./types";

export interface LaunchRequestFields {
  region?: string;
  instanceType: string;
  sshKeyName: string;
  fileSystemName?: string;
  quantity: number;
}

const QUANTITY_MESSAGE = `Invalid input. Please enter a number between ${MIN_QUANTITY} and ${MAX_QUANTITY}.`;

export function createLaunchRequest(fields: LaunchRequestFields): LaunchRequest {
  if (!fields.instanceType.trim()) {
    throw new CliError({ kind: "validation", message: "Instance type is required." });
  }
  if (!fields.sshKeyName.trim()) {
    throw new CliError({ kind: "validation", message: "SSH key name is required." });
  }
  if (!isValidQuantity(fields.quantity)) {
    throw new CliError({ kind: "validation", message: QUANTITY_MESSAGE });
  }

  const fileSystemName = fields.fileSystemName?.trim();
  return Object.freeze({
    region: fields.region?.trim() ?? "",
    instanceType: fields.instanceType.trim(),
    sshKeyName: fields.sshKeyName.trim(),
    fileSystemName: fileSystemName ? fileSystemName : undefined,
    quantity: fields.quantity
  });
}

export function isValidQuantity(quantity: number): boolean {
  return Number.isInteger(quantity) && quantity >= MIN_QUANTITY && quantity <= MAX_QUANTITY;
}

export function parseQuantity(input: string): ValidationResult<number> {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { ok: false, message: QUANTITY_MESSAGE };
  }
  const quantity = Number(trimmed);
  if (!isValidQuantity(quantity)) {
    return { ok: false, message: QUANTITY_MESSAGE };
  }
  return { ok: true, value: quantity };
}

export function validateInstanceType(input: string): ValidationResult<string> {
  const trimmed = input.trim();
  if (!getInstanceTypes().includes(trimmed)) {
    return { ok: false, message: "Invalid instance type. Please choose from the available types." };
  }
  return { ok: true, value: trimmed };
}

/** An empty region is accepted and means the provider picks one with capacity. */
export function validateRegion(input: string, instanceType: string): ValidationResult<string> {
  const trimmed = input.trim();
  if (trimmed === "") {
    return { ok: true, value: "" };
  }
  const regions = getRegionsForInstanceType(instanceType);
  if (!regions) {
    return { ok: false, message: `Instance type '${instanceType}' not found.` };
  }
  if (!regions.includes(trimmed)) {
    return { ok: false, message: "Invalid region name. Please choose from the available regions." };
  }
  return { ok: true, value: trimmed };
}

export function validateChoice(input: string, options: readonly string[], label: string): ValidationResult<string> {
  const trimmed = input.trim();
  if (!options.includes(trimmed)) {
    return { ok: false, message: `Invalid ${label}. Please choose from the available ${label}s.` };
  }
  return { ok: true, value: trimmed };
}

/** Adapts a validator to an inquirer `validate` hook, which re-prompts on a string result. */
export function promptValidator(validate: (input: string) => ValidationResult<unknown>): (input: string) => true | string {
  return (input: string) => {
    const result = validate(input);
    return result.ok ? true : result.message;
  };
}

export function expectValid<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw new CliError({ kind: "validation", message: result.message });
  }
  return result.value;
}
