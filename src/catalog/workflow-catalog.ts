/**
 * Workflow Catalog
 * Stores workflow metamodels and selects them by handled intent
 */

import type { WorkflowMetamodel } from "../schema/types";

export interface WorkflowCatalog {
  getWorkflowById(id: string): WorkflowMetamodel | undefined;
  findByIntent(intentId: string): WorkflowMetamodel[];
}

function scoreFor(workflow: WorkflowMetamodel, intentId: string): number {
  const intent = workflow.handledIntents?.find((i) => i.intentId === intentId);
  return intent?.score ?? 0;
}

export class InMemoryWorkflowCatalog implements WorkflowCatalog {
  private workflows = new Map<string, WorkflowMetamodel>();

  constructor(workflows: WorkflowMetamodel[] = []) {
    for (const workflow of workflows) this.save(workflow);
  }

  save(workflow: WorkflowMetamodel): void {
    this.workflows.set(workflow.id, workflow);
  }

  getWorkflowById(id: string): WorkflowMetamodel | undefined {
    return this.workflows.get(id);
  }

  remove(id: string): boolean {
    return this.workflows.delete(id);
  }

  list(): WorkflowMetamodel[] {
    return Array.from(this.workflows.values());
  }

  /**
   * Enabled workflows handling the intent, highest score first.
   * Equal scores keep insertion order.
   */
  findByIntent(intentId: string): WorkflowMetamodel[] {
    return this.list()
      .filter(
        (workflow) =>
          workflow.enabled &&
          (workflow.handledIntents ?? []).some((i) => i.intentId === intentId),
      )
      .sort((a, b) => scoreFor(b, intentId) - scoreFor(a, intentId));
  }

  /**
   * Stamp `lastExecuted` on the workflow's intent entry.
   * Returns false when the workflow does not handle the intent.
   */
  recordExecution(workflowId: string, intentId: string, at: Date): boolean {
    const workflow = this.workflows.get(workflowId);
    const intents = workflow?.handledIntents;
    if (!workflow || !intents) return false;

    const index = intents.findIndex((i) => i.intentId === intentId);
    if (index === -1) return false;

    const updated = intents.map((intent, i) =>
      i === index ? { ...intent, lastExecuted: at.toISOString() } : intent,
    );
    this.workflows.set(workflowId, { ...workflow, handledIntents: updated });
    return true;
  }

  get size(): number {
    return this.workflows.size;
  }
}
