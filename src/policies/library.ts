// ============================================
// Policy Library: canonical policy documents on disk
// ============================================

import fs from "fs/promises";
import path from "path";
import { policyNotFound } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

/**
 * Canonical policy identifiers shipped with the assistant.
 */
export const POLICY_IDS = [
  "refund_policy",
  "warranty_policy",
  "shipping_policy",
  "privacy_policy",
  "terms_of_service",
] as const;

export type PolicyId = (typeof POLICY_IDS)[number];

export interface PolicyDocument {
  id: string;
  filename: string;
  content: string;
}

export interface PolicyLibrary {
  /** Full text of a policy. Rejects with POLICY_NOT_FOUND when unknown. */
  getFullText(policyId: string): Promise<string>;

  /** Every document in the library, for indexing. */
  listDocuments(): Promise<PolicyDocument[]>;
}

const POLICY_EXTENSIONS = [".md", ".txt"];
const POLICY_ID_PATTERN = /^[a-z0-9_-]+$/i;

/**
 * "refund_policy" → "Refund Policy", "terms_of_service" → "Terms Of Service".
 */
export function formatPolicyTitle(policyId: string): string {
  return policyId
    .split("_")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

/**
 * Reads `<dir>/<policyId>.md` (or `.txt`).
 */
export class FilePolicyLibrary implements PolicyLibrary {
  constructor(private readonly dir: string) {}

  async getFullText(policyId: string): Promise<string> {
    if (!POLICY_ID_PATTERN.test(policyId)) {
      throw policyNotFound(policyId);
    }

    for (const ext of POLICY_EXTENSIONS) {
      const filePath = path.join(this.dir, `${policyId}${ext}`);
      try {
        return await fs.readFile(filePath, "utf-8");
      } catch (err) {
        if (!isMissingFile(err)) throw err;
      }
    }

    logger.warn("Policy document missing", { stage: "policy", policyId, dir: this.dir });
    throw policyNotFound(policyId);
  }

  async listDocuments(): Promise<PolicyDocument[]> {
    const entries = await fs.readdir(this.dir);
    const documents: PolicyDocument[] = [];

    for (const filename of entries.sort()) {
      const ext = path.extname(filename);
      if (!POLICY_EXTENSIONS.includes(ext)) continue;

      const content = await fs.readFile(path.join(this.dir, filename), "utf-8");
      documents.push({ id: path.basename(filename, ext), filename, content });
    }

    return documents;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
