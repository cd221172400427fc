/**
 * Stage and artifact-role vocabulary
 *
 * Each stage declares the directory it owns, whether it runs once per sample
 * or once per run, and the roles (with file names) it is allowed to produce.
 * The layout, the orchestrator and the tests all read this one table.
 *
 * @module layout/stages
 */

export const PER_SAMPLE_STAGES = [
  "trim",
  "filter",
  "assemble",
  "curate_contigs",
  "stats",
  "annotate",
] as const;

export const CROSS_SAMPLE_STAGES = [
  "cross_sample_typing",
  "cross_sample_virulence",
  "cross_sample_resistance",
  "homology_search",
  "pangenome",
  "pangenome_plots",
] as const;

export const STAGES = [...PER_SAMPLE_STAGES, ...CROSS_SAMPLE_STAGES] as const;

export type PerSampleStage = (typeof PER_SAMPLE_STAGES)[number];
export type CrossSampleStage = (typeof CROSS_SAMPLE_STAGES)[number];
export type Stage = (typeof STAGES)[number];

export const ARTIFACT_ROLES = [
  "R1_paired",
  "R2_paired",
  "R1_unpaired",
  "R2_unpaired",
  "filter_log",
  "contigs_raw",
  "contigs_curated",
  "stats_report",
  "annotation_gff",
  "typing_report",
  "virulence_report",
  "resistance_report",
  "homology_contigs",
  "homology_hits",
  "homology_report",
  "pangenome_presence_absence",
  "pangenome_summary",
  "pangenome_tree",
  "pangenome_plot",
] as const;

export type ArtifactRole = (typeof ARTIFACT_ROLES)[number];

/**
 * Roles a reclassified filter output can take
 */
export type PairedReadRole = "R1_paired" | "R2_paired";

/**
 * Builds an artifact's file name; per-sample stages receive the sample id
 */
type FileNamer = (sample: string) => string;

interface RoleDeclaration {
  readonly file: FileNamer;
  /** Whether the stage must leave this artifact behind to count as complete */
  readonly required: boolean;
}

export interface StageDeclaration {
  readonly directory: string;
  readonly scope: "sample" | "run";
  readonly roles: Readonly<Partial<Record<ArtifactRole, RoleDeclaration>>>;
}

const fixed = (name: string): RoleDeclaration => ({ file: () => name, required: true });
const perSample = (suffix: string): RoleDeclaration => ({
  file: (sample) => `${sample}${suffix}`,
  required: true,
});
const optional = (declaration: RoleDeclaration): RoleDeclaration => ({
  ...declaration,
  required: false,
});

export const STAGE_DECLARATIONS: Readonly<Record<Stage, StageDeclaration>> = {
  trim: {
    directory: "trimming",
    scope: "sample",
    roles: {
      R1_paired: perSample("_R1_paired.fastq"),
      R2_paired: perSample("_R2_paired.fastq"),
      R1_unpaired: perSample("_R1_unpaired.fastq"),
      R2_unpaired: perSample("_R2_unpaired.fastq"),
    },
  },
  filter: {
    directory: "filtering",
    scope: "sample",
    roles: {
      R1_paired: perSample("_R1_paired.fastq"),
      R2_paired: perSample("_R2_paired.fastq"),
      filter_log: optional(perSample(".log")),
    },
  },
  assemble: {
    directory: "assembly",
    scope: "sample",
    roles: { contigs_raw: fixed("contigs.fasta") },
  },
  curate_contigs: {
    directory: "contigs",
    scope: "sample",
    roles: { contigs_curated: perSample("_contigs.fasta") },
  },
  stats: {
    directory: "assembly_stats",
    scope: "sample",
    roles: { stats_report: fixed("report.txt") },
  },
  annotate: {
    directory: "annotation",
    scope: "sample",
    roles: { annotation_gff: perSample(".gff") },
  },
  cross_sample_typing: {
    directory: "typing",
    scope: "run",
    roles: { typing_report: fixed("mlst.txt") },
  },
  cross_sample_virulence: {
    directory: "virulence",
    scope: "run",
    roles: { virulence_report: fixed("virulence_genes.tab") },
  },
  cross_sample_resistance: {
    directory: "resistance",
    scope: "run",
    roles: { resistance_report: fixed("resistance_genes.tab") },
  },
  homology_search: {
    directory: "homology",
    scope: "run",
    roles: {
      homology_contigs: fixed("contigs_db.fasta"),
      homology_hits: fixed("alignment_hits.tsv"),
      homology_report: fixed("alignment_hits_coverage.tab"),
    },
  },
  pangenome: {
    directory: "pangenome",
    scope: "run",
    roles: {
      pangenome_presence_absence: fixed("gene_presence_absence.csv"),
      pangenome_summary: fixed("summary_statistics.txt"),
      pangenome_tree: fixed("accessory_binary_genes.fa.newick"),
    },
  },
  pangenome_plots: {
    directory: "pangenome_plots",
    scope: "run",
    roles: { pangenome_plot: fixed("pangenome_matrix.png") },
  },
};

export function isPerSampleStage(stage: Stage): stage is PerSampleStage {
  return STAGE_DECLARATIONS[stage].scope === "sample";
}

/**
 * Roles the stage declares, in declaration order
 */
export function rolesOf(stage: Stage): ArtifactRole[] {
  return ARTIFACT_ROLES.filter((role) => STAGE_DECLARATIONS[stage].roles[role] !== undefined);
}
