import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export const thresholdValues = {
  disk_free_warn_pct: 20,
  disk_free_alert_pct: 10,
  cpu_warn_pct: 80,
  cpu_alert_pct: 90,
  mem_used_warn_pct: 80,
  mem_used_alert_pct: 90,
  service_allowlist: ["gupdate"],
  max_uptime_days: 30
};

export const collectorDocuments: Record<string, unknown> = {
  "system_info.json": { Hostname: "WS-042", OS: "Windows 11 Pro", UptimeHours: 800, BootTime: "2025-12-18T08:00:00" },
  "disk.json": [
    { Drive: "C:", SizeGB: 237.9, FreeGB: 13.1, FreePercent: 5.5, VolumeName: "OS" },
    { Drive: "D:", SizeGB: 100, FreeGB: 15, FreePercent: 15, VolumeName: "Data" },
    { Drive: "E:", SizeGB: 500, FreeGB: 300, FreePercent: 60, VolumeName: null },
    { Drive: "F:" },
    { Drive: "G:", FreePercent: "n/a" }
  ],
  "resource.json": { CpuLoadPercent: 95, MemoryUsedPercent: null },
  "services.json": [
    { Name: "Spooler", DisplayName: "Print Spooler", State: "Stopped", StartMode: "Auto" },
    { Name: "GUpdate", DisplayName: "Google Update", State: "Stopped", StartMode: "Auto" }
  ],
  "reboot.json": { Pending: true, Reasons: ["WindowsUpdate"] },
  "defender.json": { Available: true, RealTimeProtectionEnabled: false, AntivirusEnabled: true, Notes: null }
};

const scratchDirs: string[] = [];

export async function scratchDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  scratchDirs.push(dir);
  return dir;
}

export async function removeScratchDirs(): Promise<void> {
  await Promise.all(scratchDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
}

export async function writeCollectorOutput(overrides: Record<string, unknown> = {}): Promise<string> {
  const dir = await scratchDir("opsreport-endpoint-");
  const documents = { ...collectorDocuments, ...overrides };
  for (const [file, body] of Object.entries(documents)) {
    await writeFile(join(dir, file), JSON.stringify(body), "utf8");
  }
  return dir;
}
