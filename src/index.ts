/**
 * Bacterial genome assembly, annotation and pan-genome pipeline
 *
 * @example
 * ```typescript
 * import { createRunContext, executePipeline, loadConfig } from "panflow";
 *
 * const { config } = await loadConfig({ configPath: "pipeline.json" });
 * const report = await executePipeline(await createRunContext(config));
 * ```
 */

export * from "./errors";
export type {
  AbstractSequence,
  FastaSequence,
  FilePath,
  ParserOptions,
  Sample,
  SequenceAlphabet,
} from "./types";
export { FastaSequenceSchema, SampleIdSchema, SequenceIdSchema } from "./types";

// Formats
export { FastaParser, FastaWriter, parseFastaHeader } from "./formats/fasta";
export type { FastaParserOptions, FastaWriterOptions } from "./formats/fasta";
export { DelimitedParser, DelimitedWriter, parseDelimitedRow } from "./formats/dsv";
export type { DelimitedParserOptions, DelimitedRow, DelimitedWriterOptions } from "./formats/dsv";

// Layout
export { ArtifactLayout, COMPLETION_MARKER, validateSampleId } from "./layout/artifact-layout";
export {
  ARTIFACT_ROLES,
  CROSS_SAMPLE_STAGES,
  PER_SAMPLE_STAGES,
  STAGE_DECLARATIONS,
  STAGES,
} from "./layout/stages";
export type {
  ArtifactRole,
  CrossSampleStage,
  PairedReadRole,
  PerSampleStage,
  Stage,
} from "./layout/stages";

// Transformations
export { curateContigs, curatedContigId } from "./transform/curate-contigs";
export type { CurateContigsOptions, CurationResult } from "./transform/curate-contigs";
export { reclassifyFilteredReads, removeProducedFiles } from "./transform/reclassify-reads";
export type { ReclassifiedFile, ReclassifiedReads, ReclassifyOptions } from "./transform/reclassify-reads";
export { classifyProducedFile, PRINSEQ_PATTERN, PRODUCED_FILE_PATTERNS } from "./transform/read-patterns";
export type { FileClassification, ProducedFilePattern } from "./transform/read-patterns";

// Alignment tables
export {
  ALIGNMENT_HIT_COLUMNS,
  IDENTITY_THRESHOLD,
  postProcessAlignmentHits,
  proteinCoverage,
} from "./tabular/alignment-hits";
export type { AlignmentTable, PostProcessOptions, PostProcessResult } from "./tabular/alignment-hits";

// Tools and annotators
export { describeInvocation, ToolRunner, TOOL_NAMES } from "./tools/tool-runner";
export type { ToolInvocation, ToolName, ToolRunnerShape } from "./tools/tool-runner";
export { DfastAnnotator, ProkkaAnnotator, selectAnnotator } from "./annotation/annotator";
export type { AnnotationRequest, Annotator } from "./annotation/annotator";

// Configuration
export { DEFAULT_CONFIG } from "./config/defaults";
export { loadConfig, resolveConfig } from "./config/loader";
export type { ConfigOverrides, LoadConfigOptions, LoadedConfig } from "./config/loader";
export { PipelineConfigSchema } from "./config/schema";
export type { PipelineConfig } from "./config/schema";
export { createRunContext, timestampedRootName } from "./config/run-context";
export type { ReferenceGenome, RunContext } from "./config/run-context";
export { loadAuxiliaryManifest, loadSampleManifest } from "./manifest/manifest";
export type { AuxiliaryFiles } from "./manifest/manifest";

// Orchestration
export { executePipeline, runPipeline } from "./pipeline/orchestrator";
export type { ExecuteOptions, RunReport, SampleReport } from "./pipeline/orchestrator";
export { completedSamples, findCompletedSamples } from "./pipeline/progress";
export type { StageOutcome, StageResult } from "./pipeline/stage-runner";
export { loggerLayer } from "./logging";
