/**
 * JSON Schemas for node metamodel, node catalog and workflow documents.
 * Used for shape validation with AJV; semantic rules live in the validators.
 */

import {
  EMBEDDINGS_PORT_ROLES,
  HTTP_METHODS,
  LLM_PORT_ROLES,
  NODE_KINDS,
  PORT_TYPES,
  REST_PORT_ROLES,
  VECTOR_DB_PORT_ROLES,
} from "./types";

const portSchemaDefinition = {
  type: "object",
  required: ["type"],
  additionalProperties: false,
  properties: {
    type: { type: "string", enum: PORT_TYPES },
    items: { $ref: "#/definitions/portSchema" },
    properties: {
      type: "object",
      additionalProperties: { $ref: "#/definitions/portSchema" },
    },
    required: { type: "boolean" },
  },
} as const;

function rolePort(portType: string, roles: readonly string[]) {
  return {
    type: "object",
    required: ["key", "schema", "portType", "role"],
    additionalProperties: false,
    properties: {
      key: { type: "string" },
      schema: { $ref: "#/definitions/portSchema" },
      defaultValue: {},
      portType: { type: "string", const: portType },
      role: { type: "string", enum: roles },
    },
  };
}

const portDefinition = {
  type: "object",
  oneOf: [
    {
      type: "object",
      required: ["key", "schema", "portType"],
      additionalProperties: false,
      properties: {
        key: { type: "string" },
        schema: { $ref: "#/definitions/portSchema" },
        defaultValue: {},
        portType: { type: "string", const: "STANDARD" },
      },
    },
    rolePort("REST", REST_PORT_ROLES),
    rolePort("LLM", LLM_PORT_ROLES),
    rolePort("EMBEDDINGS", EMBEDDINGS_PORT_ROLES),
    rolePort("VECTOR_DB", VECTOR_DB_PORT_ROLES),
  ],
};

const workflowNodeDefinition = {
  type: "object",
  required: ["id", "nodeMetamodelId"],
  additionalProperties: false,
  properties: {
    id: { type: "string" },
    nodeMetamodelId: { type: "string" },
    executionType: { type: "string", enum: ["JOIN", "MERGE"] },
  },
} as const;

const workflowEdgeDefinition = {
  type: "object",
  required: ["id", "sourceNodeId", "targetNodeId"],
  additionalProperties: false,
  properties: {
    id: { type: "string" },
    sourceNodeId: { type: "string" },
    targetNodeId: { type: "string" },
    bindings: {
      type: "object",
      additionalProperties: { type: "string" },
    },
    condition: {
      type: "object",
      required: ["port", "targetValue"],
      additionalProperties: false,
      properties: {
        port: { type: "string" },
        targetValue: { type: "string" },
      },
    },
  },
} as const;

const portList = {
  type: "array",
  items: { $ref: "#/definitions/port" },
} as const;

function requireForKind(kind: string, required: string[]) {
  return {
    if: {
      type: "object",
      required: ["kind"],
      properties: { kind: { const: kind } },
    },
    then: { type: "object", required },
  };
}

const nodeMetamodelDefinition = {
  type: "object",
  required: ["id", "name", "version", "enabled", "kind", "inputPorts"],
  properties: {
    id: { type: "string" },
    name: { type: "string" },
    description: { type: "string" },
    author: { type: "string" },
    version: { type: "string" },
    enabled: { type: "boolean" },
    createdAt: { type: "string", format: "date-time" },
    updatedAt: { type: "string", format: "date-time" },
    kind: { type: "string", enum: NODE_KINDS },
    inputPorts: portList,
    outputPorts: portList,
    provider: { type: "string" },
    modelName: { type: "string" },
    systemPromptTemplate: { type: "string" },
    defaultLlmParameters: {
      type: "object",
      additionalProperties: false,
      properties: {
        temperature: { type: "number", minimum: 0 },
        topP: { type: "number", minimum: 0, maximum: 1 },
        maxTokens: { type: "integer", minimum: 1 },
      },
    },
    uri: { type: "string" },
    invocationMethod: { type: "string", enum: HTTP_METHODS },
    headers: { type: "object", additionalProperties: { type: "string" } },
    databaseName: { type: "string" },
    collectionName: { type: "string" },
    indexName: { type: "string" },
    vectorField: { type: "string" },
    parameters: {
      type: "object",
      additionalProperties: false,
      properties: {
        limit: { type: "integer", minimum: 1 },
        threshold: { type: "number" },
      },
    },
    start: { type: "integer" },
    end: { type: "integer" },
    step: { type: "integer" },
    nodes: { type: "array", items: { $ref: "#/definitions/workflowNode" } },
    edges: { type: "array", items: { $ref: "#/definitions/workflowEdge" } },
  },
  allOf: [
    requireForKind("LLM", ["outputPorts", "provider", "modelName"]),
    requireForKind("EMBEDDINGS", ["outputPorts", "provider", "modelName"]),
    requireForKind("REST", ["outputPorts", "uri", "invocationMethod"]),
    requireForKind("VECTOR_DB", [
      "outputPorts",
      "uri",
      "databaseName",
      "collectionName",
      "indexName",
      "vectorField",
    ]),
    requireForKind("CYCLIC", [
      "outputPorts",
      "start",
      "end",
      "step",
      "nodes",
      "edges",
    ]),
  ],
};

const definitions = {
  portSchema: portSchemaDefinition,
  port: portDefinition,
  workflowNode: workflowNodeDefinition,
  workflowEdge: workflowEdgeDefinition,
  nodeMetamodel: nodeMetamodelDefinition,
};

export const nodeMetamodelJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "portflow://schemas/node-metamodel.json",
  title: "Node Metamodel",
  description: "A node metamodel: ports plus kind-specific configuration",
  definitions,
  $ref: "#/definitions/nodeMetamodel",
};

export const nodeCatalogJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "portflow://schemas/node-catalog.json",
  title: "Node Catalog",
  description: "A list of node metamodels",
  definitions,
  type: "object",
  required: ["nodes"],
  properties: {
    $schema: { type: "string" },
    nodes: {
      type: "array",
      items: { $ref: "#/definitions/nodeMetamodel" },
    },
  },
};

export const workflowJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "portflow://schemas/workflow.json",
  title: "Workflow Metamodel",
  description: "A workflow graph over node metamodels",
  definitions,
  type: "object",
  required: ["id", "name", "version", "enabled", "nodes", "edges"],
  additionalProperties: false,
  properties: {
    $schema: {
      type: "string",
      description: "JSON Schema reference for IDE validation",
    },
    id: { type: "string" },
    name: { type: "string" },
    description: { type: "string" },
    version: { type: "string" },
    enabled: { type: "boolean" },
    nodes: {
      type: "array",
      items: { $ref: "#/definitions/workflowNode" },
    },
    edges: {
      type: "array",
      items: { $ref: "#/definitions/workflowEdge" },
    },
    handledIntents: {
      type: "array",
      items: {
        type: "object",
        required: ["intentId"],
        additionalProperties: false,
        properties: {
          intentId: { type: "string" },
          score: { type: "number" },
          lastExecuted: { type: "string", format: "date-time" },
        },
      },
    },
    metadata: {
      type: "object",
      additionalProperties: true,
    },
  },
};
