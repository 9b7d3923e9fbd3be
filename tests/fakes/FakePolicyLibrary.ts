/**
 * Policies held in a Map. Unknown ids reject with POLICY_NOT_FOUND.
 */

import { policyNotFound } from "../../src/lib/errors.js";
import type { PolicyDocument, PolicyLibrary } from "../../src/policies/library.js";

export class FakePolicyLibrary implements PolicyLibrary {
  readonly requested: string[] = [];
  private readonly docs: Map<string, string>;

  constructor(docs: Record<string, string> = {}) {
    this.docs = new Map(Object.entries(docs));
  }

  async getFullText(policyId: string): Promise<string> {
    this.requested.push(policyId);
    const content = this.docs.get(policyId);
    if (content === undefined) throw policyNotFound(policyId);
    return content;
  }

  async listDocuments(): Promise<PolicyDocument[]> {
    return [...this.docs.entries()].map(([id, content]) => ({ id, filename: `${id}.md`, content }));
  }
}
