#!/usr/bin/env node
import { mkdirSync, writeFileSync } from "node:fs";
import { isAbsolute, join, relative } from "node:path";
import { ArtifactEmitter } from "./lib/emit";
import { AuditLog } from "./lib/audit";
import { ConfigManager, findProjectRoot } from "./lib/config";
import { YamlSpecLoader } from "./lib/document";
import { SpecDefectError } from "./lib/errors";
import { globalLogger } from "./lib/logger";
import { SuiteGenerator, SuiteOutcome } from "./lib/suite";
import { Command } from "./lib/types";

const PROJECT_ROOT = findProjectRoot(__dirname);
const CONFIG_PATH = join(PROJECT_ROOT, "cmdspec.config.json");
const DEFAULT_SPEC_FILE = "examples/ipsec-ike-encryption.yaml";

type LoadedSpec = { file: string; command: Command } | { file: string; error: SpecDefectError };

function loadSpecs(files: string[], loader: YamlSpecLoader): LoadedSpec[] {
  return files.map((file): LoadedSpec => {
    const path = isAbsolute(file) ? file : join(PROJECT_ROOT, file);
    try {
      return { file, command: loader.loadFile(path) };
    } catch (error) {
      if (error instanceof SpecDefectError) {
        return { file, error };
      }
      throw error;
    }
  });
}

async function main(): Promise<void> {
  const config = new ConfigManager(PROJECT_ROOT, CONFIG_PATH);
  const envFiles = config.loadEnvironment();
  globalLogger.setLevel(config.getLogLevel());
  if (envFiles.length > 0) {
    globalLogger.debug("Loaded environment", { files: envFiles });
  }

  // CLI args, then CMDSPEC_SPEC_FILES, then the bundled example
  const argFiles = process.argv.slice(2);
  const envSpecFiles = config.getSpecFiles();
  const files = argFiles.length > 0 ? argFiles : envSpecFiles.length > 0 ? envSpecFiles : [DEFAULT_SPEC_FILE];
  const outputDir = config.getOutputDir();

  globalLogger.info(`Processing ${files.length} spec file(s)`, { output: relative(PROJECT_ROOT, outputDir) });

  const audit = new AuditLog();
  const loaded = loadSpecs(files, new YamlSpecLoader());
  const generator = new SuiteGenerator({
    catalog: config.loadCatalog(),
    license: config.getLicenses(),
    suppressedGaps: config.getSuppressedGaps(),
    maxSearchNodes: config.getMaxSearchNodes(),
    logger: globalLogger,
    audit,
  });

  const outcomes: SuiteOutcome[] = [];
  for (const spec of loaded) {
    if ("error" in spec) {
      audit.recordDefects(spec.file, spec.error.issues);
      globalLogger.error(spec.error.message, { file: spec.file });
      outcomes.push({ status: "failed", command: spec.file, error: spec.error });
      continue;
    }
    outcomes.push(...generator.generateBatch([spec.command]));
  }

  const emitter = new ArtifactEmitter(outputDir, globalLogger);
  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      const { entry } = emitter.emit(outcome.suite);
      globalLogger.info(`Wrote ${entry.file}`, {
        boundaryCases: entry.boundaryCases,
        combinations: entry.combinations,
        roundTrips: entry.roundTrips,
      });
    }
  }
  emitter.finalize();

  mkdirSync(outputDir, { recursive: true });
  writeFileSync(join(outputDir, "audit.json"), JSON.stringify(audit.toJSON(), null, 2), "utf8");

  const summary = audit.getSummary();
  const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
  globalLogger.info(`Done: ${outcomes.length - failed} succeeded, ${failed} failed`, summary);

  if (failed > 0 || summary.failures > 0 || summary.roundTripsFailed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
