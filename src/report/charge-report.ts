import type { ChargeRunReport, OutletSummary } from "../supervisor.js";

const pad = (value: number) => value.toString().padStart(2, '0');

/** Renders milliseconds as H:MM:SS, dropping partial seconds. */
export const formatDuration = (ms: number): string => {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  return `${hours}:${pad(minutes)}:${pad(totalSeconds % 60)}`;
};

const formatOutlet = (summary: OutletSummary): string[] => {
  const profile = summary.profileDefaulted ? `${summary.profileName} (defaulted)` : summary.profileName;
  const lastReading = summary.lastReading === null ? 'n/a' : `${summary.lastReading}W`;
  const chargingTime = summary.chargingDurationMs === null ? 'n/a' : formatDuration(summary.chargingDurationMs);

  const lines = [
    `${summary.outlet} [${summary.mode}, profile ${profile}]: ${summary.state} (${summary.reason ?? 'no stop reason'})`,
    `  cycles ${summary.cycleCount}, samples ${summary.samples}, last reading ${lastReading}, charging time ${chargingTime}`,
  ];
  if (summary.fault !== null) {
    lines.push(`  fault: ${summary.fault}`);
  }
  return lines;
};

export const formatChargeReport = (report: ChargeRunReport): string[] => [
  `Charge report${report.testMode ? ' (test mode, outlets were not switched)' : ''}`,
  `Elapsed ${formatDuration(report.finishedAtMs - report.startedAtMs)} for ${report.outlets.length} outlet(s)`,
  ...report.outlets.flatMap(formatOutlet),
  report.abnormal ? 'Finished with errors' : 'Finished normally',
];
