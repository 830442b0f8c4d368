#!/usr/bin/env node
import { createInterface } from "node:readline";
import { appConfig, assertRuntimeConfig } from "./config.js";
import { describeZodError, diagnoseRequestSchema } from "./contracts.js";
import { createDefaultPipeline } from "./pipeline/default-pipeline.js";
import { formatReport } from "./pipeline/report-format.js";
import { InMemorySessionStore } from "./pipeline/session-store.js";
import { toErrorMessage } from "./telemetry.js";

function getArgValue(prefix: string): string | undefined {
  const arg = process.argv.find((a) => a.startsWith(`${prefix}=`));
  if (!arg) return undefined;
  return arg.slice(prefix.length + 1);
}

/** Piped stdin is read to the end; a terminal stops at the first blank line after some text. */
async function readNarrative(): Promise<string> {
  const interactive = process.stdin.isTTY;
  if (interactive) {
    console.error("Describe your symptoms: when they started, severity, frequency, family history.");
    console.error("Press Enter on an empty line when finished.\n");
  }

  const rl = createInterface({ input: process.stdin, terminal: false });
  const lines: string[] = [];
  for await (const line of rl) {
    if (interactive && line.trim() === "" && lines.length > 0) break;
    lines.push(line);
  }
  rl.close();
  return lines.join("\n").trim();
}

async function main() {
  const parsed = diagnoseRequestSchema.safeParse({
    narrative: getArgValue("--narrative") ?? (await readNarrative()),
    location: getArgValue("--location") ?? appConfig.pipeline.defaultLocation,
    sessionId: getArgValue("--session"),
  });
  if (!parsed.success) {
    console.error(`Invalid input: ${describeZodError(parsed.error)}`);
    process.exitCode = 1;
    return;
  }

  assertRuntimeConfig();
  const pipeline = createDefaultPipeline({
    store: new InMemorySessionStore(),
    onEvent: (event) => {
      if (event.type === "stage" && event.status !== "started") {
        console.error(`  ${event.stage}: ${event.status}${event.reason ? ` (${event.reason})` : ""}`);
      }
    },
  });

  const report = await pipeline.run(parsed.data);
  console.log(process.argv.includes("--json") ? JSON.stringify(report, null, 2) : formatReport(report));
}

main().catch((error: unknown) => {
  console.error(`Diagnostic run failed: ${toErrorMessage(error)}`);
  process.exit(1);
});
