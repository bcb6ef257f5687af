import type { AttributeValue, EntityRecord } from "@opsreport/shared";
import type { EndpointDocuments, ServiceInfo } from "./documents.js";
import type { EndpointThresholds } from "./thresholds.js";

export type EndpointKind = "disk" | "cpu" | "memory" | "services" | "reboot" | "defender" | "uptime";

function entity(kind: EndpointKind, name: string, attributes: Record<string, AttributeValue | undefined>): EntityRecord {
  const flat: Record<string, AttributeValue> = { kind };
  for (const [key, value] of Object.entries(attributes)) {
    flat[key] = value ?? null;
  }
  return { name, attributes: flat };
}

export function stoppedAutomaticServices(services: readonly ServiceInfo[], allowlist: readonly string[]): ServiceInfo[] {
  const allowed = new Set(allowlist.map((name) => name.trim().toLowerCase()));
  return services.filter((service) => !allowed.has((service.Name ?? "").trim().toLowerCase()));
}

export function buildEndpointEntities(documents: EndpointDocuments, thresholds: EndpointThresholds): EntityRecord[] {
  const { disks, resource, reboot, defender, systemInfo } = documents;
  const stopped = stoppedAutomaticServices(documents.services, thresholds.service_allowlist);

  return [
    ...disks.map((disk, index) =>
      entity("disk", `Disk ${disk.Drive ?? `#${index + 1}`}`, {
        Drive: disk.Drive,
        SizeGB: disk.SizeGB,
        FreeGB: disk.FreeGB,
        FreePercent: disk.FreePercent,
        VolumeName: disk.VolumeName
      })
    ),
    entity("cpu", "CPU", { CpuLoadPercent: resource.CpuLoadPercent }),
    entity("memory", "Memory", { MemoryUsedPercent: resource.MemoryUsedPercent }),
    entity("services", "Services", {
      stopped_count: stopped.length,
      stopped_names: stopped.map((service) => service.Name ?? "").join(", ")
    }),
    entity("reboot", "Reboot", { Pending: reboot.Pending, Reasons: reboot.Reasons.join(", ") }),
    entity("defender", "Defender", {
      Available: defender.Available,
      RealTimeProtectionEnabled: defender.RealTimeProtectionEnabled,
      AntivirusEnabled: defender.AntivirusEnabled,
      Notes: defender.Notes
    }),
    entity("uptime", "Uptime", { UptimeHours: systemInfo.UptimeHours, BootTime: systemInfo.BootTime })
  ];
}
