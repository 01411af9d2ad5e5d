/**
 * Artifact emission
 * Renders each command suite as a TypeScript module and keeps the registry/index in sync.
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { Project, VariableDeclarationKind } from "ts-morph";
import { Logger } from "./logger";
import { parseSuiteEntry, Registry, SuiteRegistryEntry } from "./registry";
import { CommandSuite, ValidatorTable } from "./suite";
import { hashText, sanitizeIdentifier, slugify } from "./utils";

export interface EmitResult {
  entry: SuiteRegistryEntry;
  path: string;
  text: string;
}

function json(value: unknown): string {
  return JSON.stringify(value ?? null, null, 2);
}

function validatorsLiteral(table: ValidatorTable): string {
  const lines = ["{"];
  for (const [parameter, scopes] of Object.entries(table)) {
    lines.push(`  ${JSON.stringify(parameter)}: {`);
    for (const [scope, source] of Object.entries(scopes)) {
      lines.push(`    ${JSON.stringify(scope)}: (x: unknown): boolean => ${source},`);
    }
    lines.push("  },");
  }
  lines.push("}");
  return lines.join("\n");
}

/**
 * Index module re-exporting every emitted suite
 */
export function renderIndex(entries: SuiteRegistryEntry[]): string {
  const lines: string[] = [];
  for (const entry of entries) {
    lines.push(`export * as ${sanitizeIdentifier(entry.id)} from "./${entry.file.replace(/\.ts$/, "")}";`);
  }
  lines.push("");
  lines.push("export const suites = [");
  for (const entry of entries) {
    lines.push(`  { id: ${JSON.stringify(entry.id)}, command: ${JSON.stringify(entry.command)}, file: ${JSON.stringify(entry.file)} },`);
  }
  lines.push("];");
  lines.push("");
  return lines.join("\n");
}

export class ArtifactEmitter {
  private project: Project;
  private registry: Registry<SuiteRegistryEntry>;

  constructor(private outputDir: string, private logger: Logger = new Logger("info", false)) {
    this.project = new Project({ useInMemoryFileSystem: true });
    this.registry = new Registry(
      join(outputDir, "registry.json"),
      join(outputDir, "index.ts"),
      renderIndex,
      parseSuiteEntry
    );
  }

  /**
   * Source text of the `<slug>.cases.ts` module for a suite
   */
  render(suite: CommandSuite): string {
    const slug = slugify(suite.command.name);
    const sourceFile = this.project.createSourceFile(`${slug}.cases.ts`, "", { overwrite: true });

    sourceFile.addStatements(`// Generated by cmdspec-build from "${suite.command.name}". Do not edit.`);
    const exports: [string, string][] = [
      ["command", JSON.stringify(suite.command.name)],
      ["boundaryCases", json(suite.boundaryCases)],
      ["pairwiseMatrix", json(suite.pairwise)],
      ["roundTripResults", json(suite.roundTrips)],
      ["fieldMappings", json(suite.fieldMappings)],
      ["caseFailures", json(suite.failures)],
      ["validators", validatorsLiteral(suite.validators)],
    ];
    for (const [name, initializer] of exports) {
      sourceFile.addVariableStatement({
        declarationKind: VariableDeclarationKind.Const,
        isExported: true,
        declarations: [{ name, initializer }],
      });
    }

    sourceFile.formatText({ indentSize: 2, convertTabsToSpaces: true });
    return sourceFile.getFullText();
  }

  /**
   * Write a suite module and register it; the registry is written by `finalize`
   */
  emit(suite: CommandSuite): EmitResult {
    const text = this.render(suite);
    const slug = slugify(suite.command.name);
    const file = `${slug}.cases.ts`;
    const path = join(this.outputDir, file);

    mkdirSync(this.outputDir, { recursive: true });
    writeFileSync(path, text, "utf8");

    const entry: SuiteRegistryEntry = {
      id: slug,
      command: suite.command.name,
      file,
      boundaryCases: suite.boundaryCases.length,
      combinations: suite.pairwise?.combinations.length ?? 0,
      roundTrips: suite.roundTrips.length,
      fieldMappings: suite.fieldMappings.length,
      hash: hashText(text),
    };
    this.registry.register(entry);
    this.logger.debug(`Wrote ${file}`, { boundaryCases: entry.boundaryCases, combinations: entry.combinations });
    return { entry, path, text };
  }

  finalize(): void {
    if (this.registry.isDirty()) {
      this.registry.persist();
      this.logger.info(`Updated registry with ${this.registry.size()} suite(s)`);
    }
  }

  getRegistry(): Registry<SuiteRegistryEntry> {
    return this.registry;
  }
}
