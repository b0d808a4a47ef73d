/**
 * Core Data Model
 * Port schemas, ports, node metamodels and workflow definitions
 */

// ============================================================================
// Port Schema
// ============================================================================

export const PORT_TYPES = [
  "STRING",
  "INT",
  "FLOAT",
  "BOOLEAN",
  "DATE",
  "OBJECT",
  "ARRAY",
] as const;

export type PortType = (typeof PORT_TYPES)[number];

export type PrimitivePortType = Exclude<PortType, "OBJECT" | "ARRAY">;

export interface PrimitiveSchema {
  readonly type: PrimitivePortType;
  readonly required: boolean;
}

export interface ArraySchema {
  readonly type: "ARRAY";
  readonly items: PortSchema;
  readonly required: boolean;
}

/**
 * An OBJECT schema with no declared properties is an "open object":
 * it accepts any object value.
 */
export interface ObjectSchema {
  readonly type: "OBJECT";
  readonly properties: Readonly<Record<string, PortSchema>>;
  readonly required: boolean;
}

export type PortSchema = PrimitiveSchema | ArraySchema | ObjectSchema;

/**
 * Serialized (JSON) form of a port schema
 */
export interface PortSchemaDocument {
  type: PortType;
  items?: PortSchemaDocument;
  properties?: Record<string, PortSchemaDocument>;
  required?: boolean;
}

// ============================================================================
// Ports
// ============================================================================

export const REST_PORT_ROLES = [
  "REQ_BODY_FIELD",
  "REQ_BODY",
  "REQ_HEADER",
  "REQ_HEADER_FIELD",
  "REQ_PATH_VARIABLE",
  "REQ_QUERY_PARAMETER",
  "RES_FULL_BODY",
  "RES_BODY_FIELD",
  "RES_STATUS",
  "RES_HEADERS",
] as const;

export const LLM_PORT_ROLES = [
  "USER_PROMPT",
  "SYSTEM_PROMPT_VARIABLE",
  "RESPONSE",
] as const;

export const EMBEDDINGS_PORT_ROLES = ["INPUT_TEXT", "OUTPUT_VECTOR"] as const;

export const VECTOR_DB_PORT_ROLES = [
  "INPUT_VECTOR",
  "RESULTS",
  "FIRST_RESULT",
] as const;

export type RestPortRole = (typeof REST_PORT_ROLES)[number];
export type LlmPortRole = (typeof LLM_PORT_ROLES)[number];
export type EmbeddingsPortRole = (typeof EMBEDDINGS_PORT_ROLES)[number];
export type VectorDbPortRole = (typeof VECTOR_DB_PORT_ROLES)[number];

interface PortBase<S> {
  /** Unique within the owning port list */
  key: string;
  schema: S;
  defaultValue?: unknown;
}

export interface StandardPort<S = PortSchema> extends PortBase<S> {
  portType: "STANDARD";
}

export interface RestPort<S = PortSchema> extends PortBase<S> {
  portType: "REST";
  role: RestPortRole;
}

export interface LlmPort<S = PortSchema> extends PortBase<S> {
  portType: "LLM";
  role: LlmPortRole;
}

export interface EmbeddingsPort<S = PortSchema> extends PortBase<S> {
  portType: "EMBEDDINGS";
  role: EmbeddingsPortRole;
}

export interface VectorDbPort<S = PortSchema> extends PortBase<S> {
  portType: "VECTOR_DB";
  role: VectorDbPortRole;
}

export type Port<S = PortSchema> =
  | StandardPort<S>
  | RestPort<S>
  | LlmPort<S>
  | EmbeddingsPort<S>
  | VectorDbPort<S>;

export type PortKind = Port["portType"];

export type PortDocument = Port<PortSchemaDocument>;

// ============================================================================
// Node Metamodels
// ============================================================================

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const NODE_KINDS = [
  "LLM",
  "EMBEDDINGS",
  "REST",
  "VECTOR_DB",
  "GATEWAY",
  "CYCLIC",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

interface NodeMetamodelBase {
  id: string;
  name: string;
  description?: string;
  author?: string;
  version: string;
  enabled: boolean;
  createdAt?: string;
  updatedAt?: string;
}

interface PortedNode<P> {
  inputPorts: P[];
  outputPorts: P[];
}

export interface LlmParameters {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
}

export interface LlmNodeMetamodel<P = Port>
  extends NodeMetamodelBase,
    PortedNode<P> {
  kind: "LLM";
  provider: string;
  modelName: string;
  systemPromptTemplate?: string;
  defaultLlmParameters?: LlmParameters;
}

export interface EmbeddingsNodeMetamodel<P = Port>
  extends NodeMetamodelBase,
    PortedNode<P> {
  kind: "EMBEDDINGS";
  provider: string;
  modelName: string;
}

export interface RestNodeMetamodel<P = Port>
  extends NodeMetamodelBase,
    PortedNode<P> {
  kind: "REST";
  /** URI template; `{name}` placeholders are filled from REQ_PATH_VARIABLE ports */
  uri: string;
  invocationMethod: HttpMethod;
  headers?: Record<string, string>;
}

export interface VectorSearchParameters {
  limit?: number;
  threshold?: number;
}

export interface VectorDbNodeMetamodel<P = Port>
  extends NodeMetamodelBase,
    PortedNode<P> {
  kind: "VECTOR_DB";
  uri: string;
  databaseName: string;
  collectionName: string;
  indexName: string;
  vectorField: string;
  parameters?: VectorSearchParameters;
}

/**
 * A transparent node: its output ports are its input ports.
 */
export interface GatewayNodeMetamodel<P = Port> extends NodeMetamodelBase {
  kind: "GATEWAY";
  inputPorts: P[];
}

/**
 * Runs an inner graph once per iteration value in [start, end).
 */
export interface CyclicNodeMetamodel<P = Port>
  extends NodeMetamodelBase,
    PortedNode<P> {
  kind: "CYCLIC";
  start: number;
  end: number;
  step: number;
  nodes: WorkflowNode[];
  edges: WorkflowEdge[];
}

export type NodeMetamodel<P = Port> =
  | LlmNodeMetamodel<P>
  | EmbeddingsNodeMetamodel<P>
  | RestNodeMetamodel<P>
  | VectorDbNodeMetamodel<P>
  | GatewayNodeMetamodel<P>
  | CyclicNodeMetamodel<P>;

export type NodeMetamodelOf<K extends NodeKind> = Extract<
  NodeMetamodel,
  { kind: K }
>;

export type NodeMetamodelDocument = NodeMetamodel<PortDocument>;

export function inputPortsOf<P>(node: NodeMetamodel<P>): P[] {
  return node.inputPorts;
}

export function outputPortsOf<P>(node: NodeMetamodel<P>): P[] {
  switch (node.kind) {
    case "GATEWAY":
      return node.inputPorts;
    case "LLM":
    case "EMBEDDINGS":
    case "REST":
    case "VECTOR_DB":
    case "CYCLIC":
      return node.outputPorts;
  }
}

// ============================================================================
// Workflow Metamodel
// ============================================================================

/**
 * JOIN waits for every incoming edge; MERGE runs on the first one taken.
 */
export type ExecutionType = "JOIN" | "MERGE";

export interface WorkflowNode {
  /** Workflow-local identifier */
  id: string;
  nodeMetamodelId: string;
  executionType?: ExecutionType;
}

export interface EdgeCondition {
  /** Source output port path read from the context */
  port: string;
  /** Literal compared against the context value */
  targetValue: string;
}

export interface WorkflowEdge {
  id: string;
  sourceNodeId: string;
  targetNodeId: string;
  /** Source port path -> target port path */
  bindings?: Record<string, string>;
  condition?: EdgeCondition;
}

export interface HandledIntent {
  intentId: string;
  score?: number;
  lastExecuted?: string;
}

export interface WorkflowMetamodel {
  id: string;
  name: string;
  description?: string;
  version: string;
  enabled: boolean;
  nodes: WorkflowNode[];
  edges: WorkflowEdge[];
  handledIntents?: HandledIntent[];
  metadata?: Record<string, unknown>;
}

/**
 * The schedulable part of a workflow (also used for cyclic inner graphs)
 */
export interface GraphDefinition {
  nodes: WorkflowNode[];
  edges: WorkflowEdge[];
}

// ============================================================================
// Validation Types
// ============================================================================

export type IssueSeverity = "error" | "warning";

export interface ValidationIssue {
  /** Dotted locator, e.g. `workflow.edges.e1.binding.typeMismatch` */
  componentPath: string;
  message: string;
  severity: IssueSeverity;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
