/**
 * Testing Harness Tests
 */

import { describe, it, expect } from "vitest";
import { InMemoryNodeCatalog } from "../../catalog/node-catalog";
import { ExecutionContext } from "../../context/execution-context";
import { standardPort } from "../../schema/port";
import { stringSchema } from "../../schema/port-schema";
import type {
  EmbeddingsNodeMetamodel,
  GatewayNodeMetamodel,
  WorkflowMetamodel,
} from "../../schema/types";
import {
  ProcessSpy,
  assert,
  assertEqual,
  createOutputStub,
  createStubInstance,
  deepEqual,
  testWorkflow,
} from "../harness";

const embedder: EmbeddingsNodeMetamodel = {
  id: "embedder",
  name: "Embedder",
  version: "1.0.0",
  enabled: true,
  kind: "EMBEDDINGS",
  provider: "local",
  modelName: "test-model",
  inputPorts: [standardPort("question", stringSchema())],
  outputPorts: [],
};

const relay: GatewayNodeMetamodel = {
  id: "relay",
  name: "Relay",
  version: "1.0.0",
  enabled: true,
  kind: "GATEWAY",
  inputPorts: [standardPort("vector", stringSchema())],
};

const workflow: WorkflowMetamodel = {
  id: "test-flow",
  name: "Test Flow",
  version: "1.0.0",
  enabled: true,
  nodes: [
    { id: "embed", nodeMetamodelId: "embedder" },
    { id: "relay", nodeMetamodelId: "relay" },
  ],
  edges: [
    { id: "e1", sourceNodeId: "embed", targetNodeId: "relay", bindings: { out: "vector" } },
  ],
};

describe("testWorkflow", () => {
  it("should pass when data and status match", async () => {
    const result = await testWorkflow(workflow, {
      catalog: InMemoryNodeCatalog.from([relay]),
      instances: [createOutputStub(embedder, { out: "0.1,0.2" })],
      expectedData: { vector: "0.1,0.2" },
      expectedSuccess: true,
    });

    expect(result.failures).toEqual([]);
    expect(result.passed).toBe(true);
    expect(result.data).toEqual({ out: "0.1,0.2", vector: "0.1,0.2" });
    expect(result.logs).toContain("[relay] Gateway passed 1/1 port(s)");
  });

  it("should list every mismatch", async () => {
    const result = await testWorkflow(workflow, {
      catalog: InMemoryNodeCatalog.from([relay]),
      instances: [createOutputStub(embedder, { out: "0.1" })],
      expectedData: { vector: "0.9" },
      expectedSuccess: false,
    });

    expect(result.passed).toBe(false);
    expect(result.failures).toEqual([
      "Expected success=false, got true",
      'Expected data.vector="0.9", got "0.1"',
    ]);
  });

  it("should report the failing node", async () => {
    const result = await testWorkflow(workflow, {
      instances: [
        createStubInstance(embedder, () => {
          throw new Error("model unavailable");
        }),
        createStubInstance(relay),
      ],
      expectedError: "unavailable",
    });

    expect(result.passed).toBe(true);
    expect(result.success).toBe(false);
    expect(result.error).toBe("model unavailable");
    expect(result.errorNodeId).toBe("embed");
  });

  it("should log from default stubs", async () => {
    const result = await testWorkflow(workflow, {
      instances: [createStubInstance(embedder), createStubInstance(relay)],
    });

    expect(result.logs).toContain("[embed] stub processed");
    expect(result.logs).toContain("[relay] stub processed");
  });
});

describe("ProcessSpy", () => {
  it("should record calls with the context at start", async () => {
    const spy = new ProcessSpy();
    const context = new ExecutionContext({ question: "Where is my parcel?" });

    const result = await testWorkflow(workflow, {
      context,
      ...spy.getCallbacks(context),
      instances: [createOutputStub(embedder, { out: "v" }), createStubInstance(relay)],
    });

    expect(result.success).toBe(true);
    expect(spy.getOrder()).toEqual(["embed", "relay"]);
    expect(spy.wasNodeCalled("relay")).toBe(true);
    expect(spy.getCallsForNode("embed")[0].inputs).toEqual({ question: "Where is my parcel?" });
    expect(spy.getCallsForNode("relay")[0].inputs).toEqual({
      question: "Where is my parcel?",
      out: "v",
      vector: "v",
    });
    expect(spy.getCalls().every((call) => call.status === "completed")).toBe(true);

    spy.reset();
    expect(spy.getCalls()).toEqual([]);
  });
});

describe("assertion helpers", () => {
  it("deepEqual compares structure", () => {
    expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
    expect(deepEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    expect(deepEqual(new Date(0), new Date(0))).toBe(true);
    expect(deepEqual(/x/g, /x/i)).toBe(false);
    expect(deepEqual([1], { 0: 1 })).toBe(false);
  });

  it("assert and assertEqual throw on failure", () => {
    expect(() => assert(false, "nope")).toThrow("Assertion failed: nope");
    expect(() => assertEqual([1, 2], [1, 3])).toThrow("Assertion failed: Expected [1,3], got [1,2]");
    expect(() => assertEqual({ a: 1 }, { a: 1 })).not.toThrow();
  });
});
