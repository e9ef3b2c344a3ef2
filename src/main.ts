import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger, LogLevel } from "effect"
import { FileSystem } from "@effect/platform";
import { NodeSdk } from "@effect/opentelemetry"
import { SentrySpanProcessor } from "@sentry/opentelemetry";
import * as Sentry from "@sentry/node";
import { parseCliOptions, type CliLogLevel, type CliOptions } from "./cli.js";
import { loadChargeConfig } from "./charge-config/loader.js";
import { OutletDriver } from "./outlet-driver/types.js";
import { Supervisor } from "./supervisor.js";
import { formatChargeReport } from "./report/charge-report.js";
import { SessionsFailedError } from "./errors/sessions-failed.error.js";
import { ChargeState } from "./charge-session/types.js";
import { serviceLayers } from "./layers.js";

const isProd = process.env.NODE_ENV == 'production';

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});


const NodeSdkLive = NodeSdk.layer(() => ({
  resource: { serviceName: "battery-charge-monitor" },
  spanProcessor: new SentrySpanProcessor()
}))

const LOG_LEVELS: Record<CliLogLevel, LogLevel.LogLevel> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

const minimumLogLevel = (cli: CliOptions): LogLevel.LogLevel => {
  if (cli.logLevel !== undefined) {
    return LOG_LEVELS[cli.logLevel];
  }
  if (cli.quiet) {
    return LogLevel.Warning;
  }
  return isProd ? LogLevel.Info : LogLevel.Debug;
};

const cli = parseCliOptions(process.argv.slice(2));

const program = Effect.gen(function*() {
  const chargeConfig = yield* loadChargeConfig(cli.configFile);
  const outletDriver = yield* OutletDriver;

  if (cli.run.testMode) {
    yield* Effect.log('Test mode: outlets will be monitored but never switched off');
  }

  const supervisor = new Supervisor(outletDriver, chargeConfig, cli.run);
  const report = yield* supervisor.run();

  const lines = formatChargeReport(report);
  for (const line of lines) {
    yield* Effect.logInfo(line);
  }

  if (cli.reportFile !== undefined) {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(cli.reportFile, `${lines.join('\n')}\n`);
    yield* Effect.log(`Charge report written to ${cli.reportFile}`);
  }

  if (report.abnormal) {
    return yield* new SessionsFailedError({
      outlets: report.outlets.filter((outlet) => outlet.state === ChargeState.Error).map((outlet) => outlet.outlet),
    });
  }
}).pipe(
  Effect.provide(serviceLayers),
  Effect.provide(NodeSdkLive),
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(minimumLogLevel(cli)),
);
NodeRuntime.runMain(program);
