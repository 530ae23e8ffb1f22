import os from "node:os";
import path from "node:path";
import {
  ChokidarFileWatcher,
  ConfigurationError,
  ExitCode,
  NodeFileProbe,
  NodeVersionJournal,
  NodeVersionStore,
  VersionManager,
  createPinoLogger,
  describeError,
  exitCodeFor,
  loadConfig,
  writeDefaultConfig,
  type Logger,
} from "@autoversion/core-application";
import type { VersionConfig } from "@autoversion/core-domain";
import { USAGE, UsageError, defaultConfigPath, logLevelFrom, parseArgs, type Command } from "./cli";

function createLogger(config?: VersionConfig): Logger {
  return createPinoLogger({
    level: logLevelFrom(process.env, config?.logLevel ?? "info"),
    pretty: process.stdout.isTTY === true,
  });
}

function configFailureFields(err: unknown) {
  return err instanceof ConfigurationError
    ? { error: describeError(err), issues: err.issues }
    : { error: describeError(err) };
}

async function watch(configPath: string): Promise<ExitCode> {
  const config = await loadConfig(configPath);
  const log = createLogger(config);

  const journal = new NodeVersionJournal();
  await journal.ensureStructure(config.versionRoot);

  let finish: (code: ExitCode) => void = () => undefined;
  const done = new Promise<ExitCode>((resolve) => {
    finish = resolve;
  });

  let stopping = false;
  const shutdown = async (code: ExitCode, reason: string) => {
    if (stopping) return;
    stopping = true;
    log.info("shutting down", { reason });

    try {
      await manager.stop();
      finish(code);
    } catch (err) {
      log.error("shutdown failed", { error: describeError(err) });
      finish(ExitCode.Unexpected);
    }
  };

  const manager = new VersionManager({
    watcherFactory: () => new ChokidarFileWatcher(),
    writerFactory: (c) => new NodeVersionStore({ versionRoot: c.versionRoot, skipUnchanged: c.skipUnchanged }),
    probe: new NodeFileProbe(),
    logger: log,
    journal,
    onAllTargetsLost: () => void shutdown(ExitCode.WatchFailure, "every watched folder failed"),
  });

  const reload = async () => {
    let next: VersionConfig;
    try {
      next = await loadConfig(configPath);
      await journal.ensureStructure(next.versionRoot);
    } catch (err) {
      log.error("configuration reload rejected, keeping the running configuration", configFailureFields(err));
      return;
    }

    try {
      await manager.reload(next);
    } catch (err) {
      log.error("restart with the new configuration failed", { error: describeError(err) });
      await shutdown(exitCodeFor(err), "reload failed");
    }
  };

  process.on("SIGINT", () => void shutdown(ExitCode.Ok, "SIGINT"));
  process.on("SIGTERM", () => void shutdown(ExitCode.Ok, "SIGTERM"));
  process.on("SIGHUP", () => {
    if (!stopping) void reload();
  });

  await manager.start(config);
  return done;
}

async function init(configPath: string): Promise<ExitCode> {
  const wrote = await writeDefaultConfig(configPath);
  if (wrote) {
    console.log(`Wrote starter configuration to ${configPath}`);
  } else {
    console.log(`Configuration already exists at ${configPath}, left unchanged`);
  }
  return ExitCode.Ok;
}

async function list(file: string, configPath: string): Promise<ExitCode> {
  const config = await loadConfig(configPath);
  const store = new NodeVersionStore({ versionRoot: config.versionRoot });
  const versions = await store.listVersions(file);

  if (versions.length === 0) {
    console.log(`No versions of ${file} under ${store.versionDirFor(file)}`);
    return ExitCode.Ok;
  }
  for (const v of versions) {
    console.log(`${v.token}${v.suffix > 0 ? `-${v.suffix}` : ""}\t${v.sizeBytes}\t${path.basename(v.versionPath)}`);
  }
  return ExitCode.Ok;
}

async function journal(date: string, configPath: string): Promise<ExitCode> {
  const config = await loadConfig(configPath);
  const entries = await new NodeVersionJournal().readDay(config.versionRoot, date);

  if (entries.length === 0) {
    console.log(`No versions written on ${date}`);
    return ExitCode.Ok;
  }
  for (const e of entries) {
    console.log(`${e.createdAtIso}\t${e.sizeBytes}\t${e.sourcePath}\t${e.versionPath}`);
  }
  return ExitCode.Ok;
}

async function main(): Promise<ExitCode> {
  let command: Command;
  try {
    command = parseArgs(process.argv.slice(2), defaultConfigPath(process.env, os.homedir()));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    console.error(USAGE);
    return ExitCode.Usage;
  }

  try {
    switch (command.name) {
      case "help":
        console.log(USAGE);
        return ExitCode.Ok;
      case "init":
        return await init(command.configPath);
      case "list":
        return await list(command.file, command.configPath);
      case "journal":
        return await journal(command.date, command.configPath);
      case "watch":
        return await watch(command.configPath);
    }
  } catch (err) {
    const code = exitCodeFor(err);
    createLogger().error(code === ExitCode.Unexpected ? "unexpected failure" : "startup failed", configFailureFields(err));
    return code;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(ExitCode.Unexpected);
  });
