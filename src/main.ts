#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { env } from "./config/env";
import { logger } from "./logger";
import { ActionSpace } from "./topo/service/actionSpace";
import { inspectAction } from "./topo/service/inspectAction";

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf8"));
}

async function main() {
  const actionFile = process.argv[2];
  if (!actionFile) {
    logger.error("usage: grid-action <action.json>");
    process.exitCode = 2;
    return;
  }

  const space = ActionSpace.fromGridDocument(await readJson(env.GRID_FILE), "complete", {
    strictUpdate: env.ACTION_STRICT_UPDATE,
  });
  logger.info(
    `grid ${env.GRID_FILE}: ${space.schema.nSub} substations, ${space.schema.nLine} lines, action size ${space.size()}`
  );

  const dict = await readJson(actionFile);
  if (typeof dict !== "object" || dict === null || Array.isArray(dict)) {
    logger.error(`${actionFile} must hold a JSON object`);
    process.exitCode = 2;
    return;
  }

  const inspection = inspectAction(space, Object.fromEntries(Object.entries(dict)));
  const impactedSubs = inspection.impact.subsImpacted.flatMap((hit, sub) => (hit ? [sub] : []));
  const impactedLines = inspection.impact.linesImpacted.flatMap((hit, line) => (hit ? [line] : []));

  if (inspection.ambiguous) {
    logger.warn({ error: inspection.error }, "action is ambiguous");
    process.exitCode = 1;
  } else {
    logger.info({ types: inspection.types, impactedSubs, impactedLines }, "action is valid");
  }
  logger.info(inspection.description);
}

main().catch((err) => {
  logger.error({ err }, "action inspection failed");
  process.exit(1);
});
