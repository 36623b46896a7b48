#!/usr/bin/env -S tsx

import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import {
  parseArgs,
  resolveTimelapseConfig,
  TimelapseConfigError,
  usage,
  type ParsedArgs,
} from "../server/config/timelapse";
import { runTimelapse, SessionLockedError } from "../server/services/timelapse";
import { createToolProbe } from "../server/services/timelapse/tool-probe";
import { log } from "../server/utils/log";

const controllerDir = path.dirname(fileURLToPath(import.meta.url));

/** Exit codes: 0 finished or stopped, 1 capture/encoder failure or locked, 2 bad arguments. */
export async function main(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof TimelapseConfigError)) throw error;
    console.error(error.message);
    console.error(usage());
    return 2;
  }
  if (args.help) {
    console.log(usage());
    return 0;
  }

  const config = resolveTimelapseConfig({ env, args, controllerDir });
  log(`base directory ${config.baseDir} (${config.baseDirSource})`);

  try {
    const run = await runTimelapse({ config, probe: createToolProbe(env) });
    const summary = `session ${run.session.id} ended ${run.status.status} (${run.status.captured}/${run.status.total} frames)`;
    log(run.status.error ? `${summary}: ${run.status.error}` : summary, "timelapse", run.exitCode === 0 ? "info" : "error");
    return run.exitCode;
  } catch (error) {
    if (!(error instanceof SessionLockedError)) throw error;
    log(error.message, "timelapse", "error");
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      log(error instanceof Error ? error.message : String(error), "timelapse", "error");
      process.exit(1);
    },
  );
}
