/*
 * validate-examples.ts
 * Validate every workflow in `examples/` against `examples/nodes.json`, then
 * run the ones whose node kinds all have a registered processor.
 * Run with: `npm run validate:examples`
 */

import { promises as fs } from "fs";
import path from "path";

import { InMemoryNodeCatalog } from "../src/catalog/node-catalog";
import { runWorkflow } from "../src/engine/engine";
import { nodeKindRegistry } from "../src/registry";
import { parseNodeCatalog, parseWorkflow } from "../src/schema/parser";
import type { ValidationIssue, WorkflowMetamodel } from "../src/schema/types";
import { validateWorkflow } from "../src/validator/workflow-validator";

const EXAMPLES_DIR = path.resolve(process.cwd(), "examples");
const CATALOG_FILE = path.join(EXAMPLES_DIR, "nodes.json");

async function findWorkflowFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findWorkflowFiles(full)));
    } else if (entry.isFile() && entry.name.endsWith(".workflow.json")) {
      files.push(full);
    }
  }
  return files;
}

function printIssue(issue: ValidationIssue) {
  console.log(`  - ${issue.componentPath}: ${issue.message}`);
}

function runnable(workflow: WorkflowMetamodel, catalog: InMemoryNodeCatalog): boolean {
  return workflow.nodes.every((node) => {
    const metamodel = catalog.getNodeMetamodelById(node.nodeMetamodelId);
    return metamodel !== undefined && nodeKindRegistry.has(metamodel.kind);
  });
}

async function run() {
  console.log("Validating examples in:", EXAMPLES_DIR);

  const parsedCatalog = parseNodeCatalog(await fs.readFile(CATALOG_FILE, "utf-8"));
  if (!parsedCatalog.value) {
    console.log("Invalid node catalog:");
    for (const e of parsedCatalog.validation.errors) printIssue(e);
    process.exit(2);
  }

  const catalog = new InMemoryNodeCatalog();
  for (const node of parsedCatalog.value) {
    const validation = catalog.register(node);
    for (const e of validation.errors) printIssue(e);
  }

  const files = await findWorkflowFiles(EXAMPLES_DIR);
  if (files.length === 0) {
    console.log("No workflow files found in examples/");
    return;
  }

  const failedFiles: string[] = [];
  const succeededFiles: string[] = [];

  for (const file of files) {
    const relative = path.relative(process.cwd(), file);
    process.stdout.write(`Checking ${relative} ... `);

    const parsed = parseWorkflow(await fs.readFile(file, "utf-8"));
    if (!parsed.value) {
      failedFiles.push(relative);
      console.log("UNREADABLE");
      for (const e of parsed.validation.errors) printIssue(e);
      continue;
    }

    const workflow = parsed.value;
    const result = validateWorkflow(workflow, catalog);
    if (!result.valid) {
      failedFiles.push(relative);
      console.log("INVALID");
      console.log(" Errors:");
      for (const e of result.errors) printIssue(e);
      if (result.warnings.length > 0) {
        console.log(" Warnings:");
        for (const w of result.warnings) printIssue(w);
      }
      continue;
    }

    if (!runnable(workflow, catalog)) {
      succeededFiles.push(relative);
      console.log("OK (validated; needs host processors to run)");
      continue;
    }

    const execResult = await runWorkflow(workflow, catalog, {
      initialData: { question: "How do I reset my password?" },
      config: { logLevel: "silent" },
    });
    if (execResult.success) {
      succeededFiles.push(relative);
      console.log("OK");
    } else {
      failedFiles.push(relative);
      console.log("RUNTIME-FAIL");
      for (const l of execResult.logs) console.log(`  - ${l}`);
    }
  }

  console.log("\nSummary:");
  console.log(`  Valid:   ${succeededFiles.length}`);
  console.log(`  Invalid: ${failedFiles.length}`);

  if (failedFiles.length > 0) {
    const red = (s: string) => `\u001b[31m${s}\u001b[0m`;
    console.log("\nFailed files:");
    for (const f of failedFiles) {
      console.log(red(`  ${f}`));
    }
    process.exitCode = 1;
  }
}

run().catch((e) => {
  console.error(e);
  process.exit(2);
});
