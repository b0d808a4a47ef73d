#!/usr/bin/env node

/**
 * Portflow CLI
 * Command-line interface for validating and running workflows
 */

import { readFileSync, existsSync } from "fs";
import { resolve, dirname } from "path";
import { parseArgs } from "util";
import { InMemoryNodeCatalog } from "../catalog/node-catalog";
import {
  ConfigError,
  loadConfig,
  loadEnvFile,
  mergeEnv,
  type PortflowConfig,
} from "../config/config";
import { WorkflowEngine } from "../engine/engine";
import { NodeInstanceRegistry, nodeKindRegistry } from "../registry";
import { parseNodeCatalog, parseWorkflow, type ParseResult } from "../schema/parser";
import { describeSchema } from "../schema/port-schema";
import {
  inputPortsOf,
  outputPortsOf,
  type NodeMetamodel,
  type Port,
  type ValidationIssue,
  type WorkflowMetamodel,
} from "../schema/types";
import { validateWorkflow } from "../validator/workflow-validator";

// ============================================================================
// CLI Helpers
// ============================================================================

const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  dim: "\x1b[2m",
};

function log(message: string, color?: keyof typeof colors): void {
  if (color) {
    console.log(`${colors[color]}${message}${colors.reset}`);
  } else {
    console.log(message);
  }
}

function logError(message: string): void {
  console.error(`${colors.red}Error: ${message}${colors.reset}`);
}

function logSuccess(message: string): void {
  log(`✓ ${message}`, "green");
}

function logWarning(message: string): void {
  log(`⚠ ${message}`, "yellow");
}

function logInfo(message: string): void {
  log(`ℹ ${message}`, "cyan");
}

function printIssues(issues: ValidationIssue[]): void {
  for (const issue of issues) {
    if (issue.severity === "error") {
      logError(`${issue.componentPath}: ${issue.message}`);
    } else {
      logWarning(`${issue.componentPath}: ${issue.message}`);
    }
  }
}

function readDocument(path: string): string {
  const resolvedPath = resolve(process.cwd(), path);
  if (!existsSync(resolvedPath)) {
    logError(`File not found: ${resolvedPath}`);
    process.exit(1);
  }
  return readFileSync(resolvedPath, "utf-8");
}

/**
 * Print parse issues; exits when the document could not be read
 */
function requireParsed<T>(label: string, parsed: ParseResult<T>): T {
  printIssues([...parsed.validation.errors, ...parsed.validation.warnings]);
  if (!parsed.validation.valid || parsed.value === null) {
    logError(`${label} is not a valid document`);
    process.exit(1);
  }
  return parsed.value;
}

interface LoadedCatalog {
  catalog: InMemoryNodeCatalog;
  nodes: NodeMetamodel[];
  issues: ValidationIssue[];
}

/**
 * Register every parsed metamodel; invalid ones are left out and reported
 */
function loadCatalog(path: string): LoadedCatalog {
  const nodes = requireParsed(path, parseNodeCatalog(readDocument(path)));
  const catalog = new InMemoryNodeCatalog();
  const issues: ValidationIssue[] = [];
  for (const node of nodes) {
    const validation = catalog.register(node);
    issues.push(...validation.errors, ...validation.warnings);
  }
  return { catalog, nodes, issues };
}

function loadWorkflow(path: string): WorkflowMetamodel {
  return requireParsed(path, parseWorkflow(readDocument(path)));
}

function readConfig(env: Record<string, string | undefined>): PortflowConfig {
  try {
    return loadConfig(env);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    for (const problem of e.problems) logError(problem);
    process.exit(1);
  }
}

function describePort(port: Port): string {
  const role = port.portType === "STANDARD" ? "" : ` ${port.portType}:${port.role}`;
  const required = port.schema.required ? " (required)" : "";
  const fallback =
    port.defaultValue === undefined ? "" : ` = ${JSON.stringify(port.defaultValue)}`;
  return `${port.key}: ${describeSchema(port.schema)}${required}${role}${fallback}`;
}

// ============================================================================
// Commands
// ============================================================================

async function validateCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      catalog: { type: "string", short: "c" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(`
Usage: portflow validate <workflow.json> --catalog <nodes.json>

Options:
  -c, --catalog <file>  Node metamodel catalog
  -h, --help            Show this help message
`);
    return;
  }

  const workflowPath = positionals[0];
  if (!workflowPath || !values.catalog) {
    logError("A workflow file and --catalog are required");
    process.exit(1);
  }

  const { catalog, issues } = loadCatalog(values.catalog);
  const workflow = loadWorkflow(workflowPath);
  const validation = validateWorkflow(workflow, catalog);

  const all = [...issues, ...validation.errors, ...validation.warnings];
  printIssues(all);

  const errorCount = all.filter((issue) => issue.severity === "error").length;
  const warningCount = all.length - errorCount;
  if (errorCount > 0) {
    logError(`Validation failed: ${errorCount} error(s), ${warningCount} warning(s)`);
    process.exit(1);
  }

  logSuccess(`Workflow "${workflow.id}" is valid`);
  log(`  Nodes: ${workflow.nodes.length}`, "dim");
  log(`  Edges: ${workflow.edges.length}`, "dim");
  if (warningCount > 0) log(`  Warnings: ${warningCount}`, "dim");
}

async function runCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      catalog: { type: "string", short: "c" },
      input: { type: "string", short: "i" },
      env: { type: "string", short: "e", multiple: true },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(`
Usage: portflow run <workflow.json> --catalog <nodes.json> [options]

Options:
  -c, --catalog <file> Node metamodel catalog
  -i, --input <json>   Initial context data as JSON object
  -e, --env <K=V>      Configuration variable (can be repeated)
  -v, --verbose        Show the execution report and final context
  -h, --help           Show this help message

Example:
  portflow run workflow.json -c nodes.json -i '{"question":"hi"}' -e PORTFLOW_LOG_LEVEL=debug
`);
    return;
  }

  const workflowPath = positionals[0];
  if (!workflowPath || !values.catalog) {
    logError("A workflow file and --catalog are required");
    process.exit(1);
  }

  let initialData: Record<string, unknown> = {};
  if (values.input) {
    try {
      const parsed: unknown = JSON.parse(values.input);
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error("expected a JSON object");
      }
      initialData = Object.fromEntries(Object.entries(parsed));
    } catch (e) {
      logError(`Invalid input JSON: ${e instanceof Error ? e.message : "Unknown error"}`);
      process.exit(1);
    }
  }

  // Precedence: -e options, then the process, then .env beside the workflow
  const envPath = resolve(dirname(resolve(process.cwd(), workflowPath)), ".env");
  const fileEnv = loadEnvFile(envPath);
  if (fileEnv) logInfo(`Loaded environment from ${envPath}`);
  const overrides: Record<string, string> = {};
  for (const entry of values.env ?? []) {
    const [key, ...valueParts] = entry.split("=");
    if (key) overrides[key] = valueParts.join("=");
  }
  const env = mergeEnv(process.env, fileEnv, overrides);

  const config = readConfig(env);
  const { catalog, issues } = loadCatalog(values.catalog);
  const workflow = loadWorkflow(workflowPath);
  const validation = validateWorkflow(workflow, catalog);
  printIssues([...issues, ...validation.errors, ...validation.warnings]);
  if (!validation.valid) {
    logError("Workflow is invalid; not running");
    process.exit(1);
  }

  logInfo(`Running workflow: ${workflowPath}`);
  log(`Registered node kinds: ${[...nodeKindRegistry.getKinds()].join(", ")}`, "dim");

  const engine = new WorkflowEngine({
    instances: new NodeInstanceRegistry({ catalog }),
    config,
  });
  const result = await engine.execute(workflow, { initialData });

  console.log("");
  if (result.success) {
    logSuccess(`Workflow completed in ${result.duration.toFixed(2)}ms`);
  } else {
    logError(`Workflow failed: ${result.error?.message}`);
    if (result.error?.nodeId) {
      log(`  at node: ${result.error.nodeId}`, "dim");
    }
  }

  if (values.verbose) {
    console.log("\nNodes:");
    for (const node of result.report.nodes) {
      const mark = node.status === "completed" ? "✓" : "✗";
      log(`  ${mark} ${node.nodeId} (${node.kind}) ${node.durationMs.toFixed(2)}ms`, "dim");
    }
    if (result.report.unprocessedNodes.length > 0) {
      log(`  not reached: ${result.report.unprocessedNodes.join(", ")}`, "dim");
    }

    if (result.context.size > 0) {
      console.log("\nFinal context:");
      for (const line of result.context.format().split("\n")) {
        log(`  ${line}`, "dim");
      }
    }
  }

  process.exit(result.success ? 0 : 1);
}

async function catalogCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      json: { type: "boolean", short: "j", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(`
Usage: portflow catalog <nodes.json> [options]

Options:
  -j, --json    Output as JSON
  -h, --help    Show this help message
`);
    return;
  }

  const catalogPath = positionals[0];
  if (!catalogPath) {
    logError("No catalog file specified");
    process.exit(1);
  }

  const { nodes, issues } = loadCatalog(catalogPath);
  printIssues(issues);

  if (values.json) {
    console.log(JSON.stringify(nodes, null, 2));
    return;
  }

  console.log("\nNode Metamodels:\n");
  for (const node of nodes) {
    log(`${node.id} (${node.kind}) v${node.version}${node.enabled ? "" : " [disabled]"}`, "cyan");
    if (node.description) log(`  ${node.description}`, "dim");
    for (const port of inputPortsOf(node)) log(`  in  ${describePort(port)}`, "green");
    if (node.kind !== "GATEWAY") {
      for (const port of outputPortsOf(node)) log(`  out ${describePort(port)}`, "blue");
    }
    console.log("");
  }

  log(`Total: ${nodes.length} node metamodels`, "dim");
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(`
Portflow CLI - Typed workflow validation and execution

Usage: portflow <command> [options]

Commands:
  validate <workflow.json>  Validate a workflow against a node catalog
  run <workflow.json>       Validate and execute a workflow
  catalog <nodes.json>      List node metamodels and their ports

Options:
  -h, --help                Show help for a command

Configuration (environment or -e):
  PORTFLOW_LOG_LEVEL        debug | info | warn | error | silent
  PORTFLOW_MAX_LOGS         Retained log entries per run
  PORTFLOW_NODE_TIMEOUT_MS  Per-node timeout, 0 for none
  PORTFLOW_MIDDLEWARE       Comma-separated middleware ids

Examples:
  portflow validate workflow.json -c nodes.json
  portflow run workflow.json -c nodes.json -v
  portflow catalog nodes.json --json
`);
    return;
  }

  const commandArgs = args.slice(1);

  switch (command) {
    case "validate":
      await validateCommand(commandArgs);
      break;
    case "run":
      await runCommand(commandArgs);
      break;
    case "catalog":
      await catalogCommand(commandArgs);
      break;
    default:
      logError(`Unknown command: ${command}`);
      console.log('Run "portflow --help" for usage information.');
      process.exit(1);
  }
}

main().catch((e) => {
  logError(e instanceof Error ? e.message : "Unknown error");
  process.exit(1);
});
