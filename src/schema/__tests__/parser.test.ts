/**
 * Document Parser Tests
 */

import { describe, it, expect } from "vitest";
import { parseNodeCatalog, parseNodeMetamodel, parseWorkflow } from "../parser";

// ============================================================================
// Fixtures
// ============================================================================

const gatewayDoc = {
  id: "router",
  kind: "GATEWAY",
  name: "Router",
  version: "1.0.0",
  enabled: true,
  inputPorts: [
    { key: "flag", portType: "STANDARD", schema: { type: "BOOLEAN" } },
  ],
};

const llmDoc = {
  id: "writer",
  kind: "LLM",
  name: "Writer",
  version: "1.0.0",
  enabled: true,
  provider: "example-provider",
  modelName: "example-model",
  inputPorts: [
    {
      key: "prompt",
      portType: "LLM",
      role: "USER_PROMPT",
      schema: { type: "STRING", required: true },
    },
  ],
  outputPorts: [
    { key: "text", portType: "LLM", role: "RESPONSE", schema: { type: "STRING" } },
  ],
};

const workflowDoc = {
  id: "wf",
  name: "Workflow",
  version: "1.0.0",
  enabled: true,
  nodes: [
    { id: "a", nodeMetamodelId: "router" },
    { id: "b", nodeMetamodelId: "writer", executionType: "MERGE" },
  ],
  edges: [
    {
      id: "e1",
      sourceNodeId: "a",
      targetNodeId: "b",
      condition: { port: "flag", targetValue: "true" },
    },
  ],
};

// ============================================================================
// Tests
// ============================================================================

describe("parseNodeMetamodel", () => {
  it("parses a gateway and builds port schemas", () => {
    const { value, validation } = parseNodeMetamodel(JSON.stringify(gatewayDoc));
    expect(validation.valid).toBe(true);
    expect(value?.kind).toBe("GATEWAY");
    expect(value?.inputPorts[0].schema).toEqual({ type: "BOOLEAN", required: false });
  });

  it("parses an LLM node with role ports", () => {
    const { value } = parseNodeMetamodel(JSON.stringify(llmDoc));
    expect(value?.kind).toBe("LLM");
    if (value?.kind === "LLM") {
      expect(value.modelName).toBe("example-model");
      expect(value.outputPorts[0].key).toBe("text");
    }
  });

  it("reports invalid JSON at the root", () => {
    const { value, validation } = parseNodeMetamodel("{ nope");
    expect(value).toBeNull();
    expect(validation.errors).toHaveLength(1);
    expect(validation.errors[0].componentPath).toBe("/");
    expect(validation.errors[0].message).toMatch(/^Invalid JSON: /);
  });

  it("requires kind-specific fields", () => {
    const { provider: _provider, ...withoutProvider } = llmDoc;
    const { validation } = parseNodeMetamodel(JSON.stringify(withoutProvider));
    expect(validation.valid).toBe(false);
    expect(
      validation.errors.some((e) => e.message === "must have required property 'provider'"),
    ).toBe(true);
  });

  it("rejects a role from another port family", () => {
    const doc = {
      ...gatewayDoc,
      inputPorts: [
        { key: "flag", portType: "LLM", role: "INPUT_TEXT", schema: { type: "STRING" } },
      ],
    };
    expect(parseNodeMetamodel(JSON.stringify(doc)).validation.valid).toBe(false);
  });

  it("turns schema invariant violations into issues", () => {
    const doc = {
      ...gatewayDoc,
      inputPorts: [{ key: "list", portType: "STANDARD", schema: { type: "ARRAY" } }],
    };
    const { value, validation } = parseNodeMetamodel(JSON.stringify(doc));
    expect(value).toBeNull();
    expect(validation.errors).toEqual([
      {
        componentPath: "/inputPorts/0/schema",
        message: "ARRAY schema at '/inputPorts/0/schema' requires 'items'",
        severity: "error",
      },
    ]);
  });
});

describe("parseNodeCatalog", () => {
  it("parses every node", () => {
    const { value, validation } = parseNodeCatalog(
      JSON.stringify({ nodes: [gatewayDoc, llmDoc] }),
    );
    expect(validation.valid).toBe(true);
    expect(value?.map((node) => node.id)).toEqual(["router", "writer"]);
  });

  it("prefixes issues with the node index", () => {
    const broken = {
      ...gatewayDoc,
      inputPorts: [{ key: "o", portType: "STANDARD", schema: { type: "OBJECT" } }],
    };
    const { validation } = parseNodeCatalog(
      JSON.stringify({ nodes: [gatewayDoc, broken] }),
    );
    expect(validation.errors.map((e) => e.componentPath)).toEqual([
      "/nodes/1/inputPorts/0/schema",
    ]);
  });
});

describe("parseWorkflow", () => {
  it("parses a workflow document", () => {
    const { value, validation } = parseWorkflow(JSON.stringify(workflowDoc));
    expect(validation.valid).toBe(true);
    expect(value?.nodes[1].executionType).toBe("MERGE");
    expect(value?.edges[0].condition).toEqual({ port: "flag", targetValue: "true" });
  });

  it("rejects unknown top-level fields", () => {
    const { validation } = parseWorkflow(JSON.stringify({ ...workflowDoc, owner: "x" }));
    expect(validation.valid).toBe(false);
    expect(validation.errors[0].message).toBe("must NOT have additional properties");
  });

  it("reports missing fields with their location", () => {
    const { validation } = parseWorkflow(
      JSON.stringify({ ...workflowDoc, edges: [{ id: "e1", sourceNodeId: "a" }] }),
    );
    expect(validation.errors).toContainEqual({
      componentPath: "/edges/0",
      message: "must have required property 'targetNodeId'",
      severity: "error",
    });
  });
});
