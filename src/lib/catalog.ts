import type { InstanceTypeInfo } from "./api";
import { formatList, formatPriceCents } from "./utils";

// Known instance types and the regions they have been offered in. Used only to reject
// obviously wrong input before an API call; the live instance-types endpoint is authoritative.
const INSTANCE_TYPES_AND_REGIONS: ReadonlyMap<string, readonly string[]> = new Map<string, readonly string[]>([
  ["gpu_8x_h100_sxm5", ["us-west-3"]],
  ["gpu_1x_h100_pcie", ["us-west-3"]],
  ["gpu_8x_a100_80gb_sxm4", ["us-midwest-1"]],
  ["gpu_1x_a10", ["us-east-1", "us-west-1"]],
  ["gpu_1x_rtx6000", ["us-south-1"]],
  ["gpu_1x_a100", ["us-south-1"]],
  ["gpu_1x_a100_sxm4", ["us-east-1", "us-west-2", "asia-south-1"]],
  ["gpu_2x_a100", ["us-south-1"]],
  ["gpu_4x_a100", ["us-south-1"]],
  [
    "gpu_8x_a100",
    ["me-west-1", "asia-northeast-2", "us-west-2", "us-west-1", "europe-central-1", "asia-northeast-1", "us-east-1"]
  ],
  ["gpu_1x_a6000", ["us-south-1"]],
  ["gpu_2x_a6000", ["us-south-1"]],
  ["gpu_4x_a6000", ["us-south-1"]],
  ["gpu_8x_v100", ["us-south-1"]],
  ["cpu_4x_general", []],
  ["gpu_8x_h100_sxm5raidz1", ["us-south-2"]]
]);

export function getInstanceTypes(): string[] {
  return [...INSTANCE_TYPES_AND_REGIONS.keys()];
}

/**
 * Regions the catalog lists for an instance type, or `undefined` when the type is unknown.
 * A known type can list no regions at all.
 */
export function getRegionsForInstanceType(instanceType: string): readonly string[] | undefined {
  return INSTANCE_TYPES_AND_REGIONS.get(instanceType);
}

export function isKnownInstanceType(instanceType: string): boolean {
  return INSTANCE_TYPES_AND_REGIONS.has(instanceType);
}

export const CATALOG_HEADERS = ["INSTANCE TYPE", "KNOWN REGIONS"] as const;
export const LIVE_HEADERS = [...CATALOG_HEADERS, "PRICE", "CAPACITY NOW"] as const;

/**
 * Table rows for the catalog. With live data, types the provider reports but the catalog
 * does not know are appended after the catalog entries.
 */
export function buildCatalogRows(live?: Record<string, InstanceTypeInfo>): string[][] {
  const rows = getInstanceTypes().map((instanceType) => {
    const known = formatList(getRegionsForInstanceType(instanceType) ?? []);
    if (!live) {
      return [instanceType, known];
    }
    const info = live[instanceType];
    return [
      instanceType,
      known,
      formatPriceCents(info?.priceCentsPerHour),
      formatList(info?.regionsWithCapacity.map((region) => region.name) ?? [])
    ];
  });

  if (live) {
    for (const [instanceType, info] of Object.entries(live)) {
      if (isKnownInstanceType(instanceType)) {
        continue;
      }
      rows.push([
        instanceType,
        "(not in catalog)",
        formatPriceCents(info.priceCentsPerHour),
        formatList(info.regionsWithCapacity.map((region) => region.name))
      ]);
    }
  }
  return rows;
}
