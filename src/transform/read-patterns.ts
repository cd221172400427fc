/**
 * Registry of tool output-file naming rules
 *
 * A filter tool writes files under names of its own choosing. A pattern says
 * which of those files the tool produced, which are to be discarded, and
 * which artifact role each remaining file fills. Matching is by substring
 * and prefix, as the tools' own names vary between versions.
 *
 * @module transform/read-patterns
 */

import type { PairedReadRole } from "../layout/stages";

export interface RoleRule {
  readonly role: PairedReadRole;
  /** Appended to the sample id to form the file-name prefix */
  readonly prefixSuffix: string;
}

export interface ProducedFilePattern {
  readonly tool: string;
  /** Substring every file the tool produced contains */
  readonly marker: string;
  /** Produced files containing any of these are deleted */
  readonly discard: readonly string[];
  readonly roles: readonly RoleRule[];
}

export type FileClassification =
  | { readonly kind: "foreign" }
  | { readonly kind: "discard" }
  | { readonly kind: "role"; readonly role: PairedReadRole }
  | { readonly kind: "unclassified" };

export const PRINSEQ_PATTERN: ProducedFilePattern = {
  tool: "prinseq",
  marker: "prinseq",
  discard: ["singletons"],
  roles: [
    { role: "R1_paired", prefixSuffix: "_R1" },
    { role: "R2_paired", prefixSuffix: "_R2" },
  ],
};

export const PRODUCED_FILE_PATTERNS: Readonly<Record<string, ProducedFilePattern>> = {
  prinseq: PRINSEQ_PATTERN,
};

/**
 * Classify one file name for a sample
 *
 * Discard markers win over role prefixes, so `S1_R1_singletons.prinseq.fastq`
 * is discarded even though it starts with `S1_R1`.
 */
export function classifyProducedFile(
  fileName: string,
  sample: string,
  pattern: ProducedFilePattern
): FileClassification {
  if (!fileName.includes(pattern.marker)) return { kind: "foreign" };
  if (pattern.discard.some((marker) => fileName.includes(marker))) return { kind: "discard" };

  const rule = pattern.roles.find((candidate) =>
    fileName.startsWith(`${sample}${candidate.prefixSuffix}`)
  );
  return rule === undefined ? { kind: "unclassified" } : { kind: "role", role: rule.role };
}
