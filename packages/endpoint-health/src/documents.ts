import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { InputError, describeIssues, errorMessage, stripBom } from "@opsreport/shared";

const measurement = z.union([z.number(), z.string()]).nullish();
const text = z.string().nullish();
const flag = z.boolean().nullish();

// Collectors serialize a one-item list as a bare object.
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess((value) => {
    if (value === null || value === undefined) return [];
    return Array.isArray(value) ? value : [value];
  }, z.array(item));
}

export const systemInfoSchema = z
  .object({
    Hostname: text,
    OS: text,
    UptimeHours: measurement,
    BootTime: text
  })
  .passthrough();

export const diskSchema = z
  .object({
    Drive: text,
    SizeGB: measurement,
    FreeGB: measurement,
    FreePercent: measurement,
    VolumeName: text
  })
  .passthrough();

export const resourceSchema = z
  .object({
    CpuLoadPercent: measurement,
    MemoryUsedPercent: measurement
  })
  .passthrough();

export const serviceSchema = z
  .object({
    Name: text,
    DisplayName: text,
    State: text,
    StartMode: text
  })
  .passthrough();

export const rebootSchema = z
  .object({
    Pending: flag,
    Reasons: listOf(z.string())
  })
  .passthrough();

export const defenderSchema = z
  .object({
    Available: flag,
    RealTimeProtectionEnabled: flag,
    AntivirusEnabled: flag,
    Notes: text
  })
  .passthrough();

export type SystemInfo = z.infer<typeof systemInfoSchema>;
export type DiskInfo = z.infer<typeof diskSchema>;
export type ResourceInfo = z.infer<typeof resourceSchema>;
export type ServiceInfo = z.infer<typeof serviceSchema>;
export type RebootInfo = z.infer<typeof rebootSchema>;
export type DefenderInfo = z.infer<typeof defenderSchema>;

export interface EndpointDocuments {
  systemInfo: SystemInfo;
  disks: DiskInfo[];
  resource: ResourceInfo;
  services: ServiceInfo[];
  reboot: RebootInfo;
  defender: DefenderInfo;
}

export async function readJsonDocument<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): Promise<z.output<S>> {
  const path = join(dir, file);
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new InputError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let value: unknown;
  try {
    value = JSON.parse(stripBom(raw));
  } catch (error) {
    throw new InputError(`${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InputError(`${path} has an unexpected shape: ${describeIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

export async function readEndpointDocuments(dir: string): Promise<EndpointDocuments> {
  return {
    systemInfo: await readJsonDocument(dir, "system_info.json", systemInfoSchema),
    disks: await readJsonDocument(dir, "disk.json", listOf(diskSchema)),
    resource: await readJsonDocument(dir, "resource.json", resourceSchema),
    services: await readJsonDocument(dir, "services.json", listOf(serviceSchema)),
    reboot: await readJsonDocument(dir, "reboot.json", rebootSchema),
    defender: await readJsonDocument(dir, "defender.json", defenderSchema)
  };
}
