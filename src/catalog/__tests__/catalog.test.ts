/**
 * Catalog Tests
 */

import { describe, it, expect } from "vitest";
import { standardPort } from "../../schema/port";
import { stringSchema } from "../../schema/port-schema";
import type { GatewayNodeMetamodel, WorkflowMetamodel } from "../../schema/types";
import { CatalogRegistrationError, InMemoryNodeCatalog } from "../node-catalog";
import { InMemoryWorkflowCatalog } from "../workflow-catalog";

const gateway = (id: string, name = id): GatewayNodeMetamodel => ({
  id,
  name,
  version: "1.0.0",
  enabled: true,
  description: "Test node",
  author: "tests",
  kind: "GATEWAY",
  inputPorts: [standardPort("question", stringSchema())],
});

describe("InMemoryNodeCatalog", () => {
  it("stores valid metamodels", () => {
    const catalog = new InMemoryNodeCatalog();
    const node = gateway("intake");
    expect(catalog.register(node).valid).toBe(true);
    expect(catalog.getNodeMetamodelById("intake")).toBe(node);
    expect(catalog.has("intake")).toBe(true);
    expect(catalog.size).toBe(1);
  });

  it("rejects metamodels with errors", () => {
    const catalog = new InMemoryNodeCatalog();
    const result = catalog.register(gateway("broken", ""));
    expect(result.valid).toBe(false);
    expect(catalog.has("broken")).toBe(false);
  });

  it("replaces an entry with the same id", () => {
    const catalog = new InMemoryNodeCatalog();
    catalog.register(gateway("intake", "First"));
    catalog.register(gateway("intake", "Second"));
    expect(catalog.list().map((n) => n.name)).toEqual(["Second"]);
  });

  it("from() throws on the first invalid metamodel", () => {
    expect(() => InMemoryNodeCatalog.from([gateway("ok"), gateway("broken", "")])).toThrow(
      CatalogRegistrationError,
    );
    expect(() => InMemoryNodeCatalog.from([gateway("broken", "")])).toThrow(
      'Node metamodel "broken" is invalid: node.name: Node name must not be empty',
    );
  });

  it("removes and clears", () => {
    const catalog = InMemoryNodeCatalog.from([gateway("a"), gateway("b")]);
    expect(catalog.remove("a")).toBe(true);
    expect(catalog.remove("a")).toBe(false);
    catalog.clear();
    expect(catalog.size).toBe(0);
  });
});

describe("InMemoryWorkflowCatalog", () => {
  const workflow = (
    id: string,
    intents: Array<[string, number]>,
    enabled = true,
  ): WorkflowMetamodel => ({
    id,
    name: id,
    version: "1.0.0",
    enabled,
    nodes: [],
    edges: [],
    handledIntents: intents.map(([intentId, score]) => ({ intentId, score })),
  });

  it("finds enabled workflows by intent, best score first", () => {
    const catalog = new InMemoryWorkflowCatalog([
      workflow("low", [["reset-password", 0.2]]),
      workflow("high", [["reset-password", 0.9]]),
      workflow("off", [["reset-password", 1]], false),
      workflow("other", [["billing", 1]]),
    ]);
    expect(catalog.findByIntent("reset-password").map((w) => w.id)).toEqual([
      "high",
      "low",
    ]);
    expect(catalog.findByIntent("unknown")).toEqual([]);
  });

  it("records the last execution of an intent", () => {
    const catalog = new InMemoryWorkflowCatalog([workflow("wf", [["billing", 1]])]);
    const at = new Date("2024-05-01T12:00:00.000Z");

    expect(catalog.recordExecution("wf", "billing", at)).toBe(true);
    expect(catalog.getWorkflowById("wf")?.handledIntents).toEqual([
      { intentId: "billing", score: 1, lastExecuted: "2024-05-01T12:00:00.000Z" },
    ]);
    expect(catalog.recordExecution("wf", "refunds", at)).toBe(false);
    expect(catalog.recordExecution("missing", "billing", at)).toBe(false);
  });
});
