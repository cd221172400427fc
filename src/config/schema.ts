/**
 * Pipeline configuration schema
 *
 * Unknown keys are rejected at every level so a misspelt option fails at
 * startup instead of silently falling back to its default.
 *
 * @module config/schema
 */

import { type } from "arktype";
import { SampleIdSchema } from "../types";

const ExecutablesSchema = type({
  "+": "reject",
  trimmomatic: "string>0",
  prinseq: "string>0",
  spades: "string>0",
  quast: "string>0",
  prokka: "string>0",
  dfast: "string>0",
  mlst: "string>0",
  abricate: "string>0",
  makeblastdb: "string>0",
  tblastn: "string>0",
  roary: "string>0",
  roaryPlots: "string>0",
});

export const PipelineConfigSchema = type({
  "+": "reject",
  outputDirectory: "string>0",
  "outputRoot?": "string>0",
  resume: "boolean",
  parallelism: "number.integer>=1",
  threads: "number.integer>=1",
  logLevel: "'debug' | 'info' | 'warning' | 'error' | 'none'",
  logFormat: "'pretty' | 'logfmt' | 'json'",
  manifests: {
    "+": "reject",
    samples: "string>0",
    auxiliary: "string>0",
  },
  trimming: {
    "+": "reject",
    enabled: "boolean",
    phred: "'-phred33' | '-phred64'",
    illuminaClip: /^\d+:\d+:\d+$/,
  },
  filtering: {
    "+": "reject",
    minLength: "number.integer>=0",
    minQualityMean: "number>=0",
    trimQualityRight: "number>=0",
    trimQualityWindow: "number.integer>=1",
    trimQualityType: "'min' | 'mean' | 'max' | 'sum'",
    outFormat: "1 | 2 | 3 | 4 | 5",
  },
  assembly: {
    "+": "reject",
    mode: "'--careful' | '--isolate' | '--sc' | '--only-assembler'",
    coverageCutoff: "'auto' | 'off' | number>0 | null",
  },
  curation: {
    "+": "reject",
    minLength: "number.integer>=0",
    marker: /^[^\s_]+$/,
  },
  stats: {
    "+": "reject",
    minContig: "number.integer>=0",
  },
  annotator: "'prokka' | 'dfast'",
  prokka: {
    "+": "reject",
    kingdom: "'Archaea' | 'Bacteria' | 'Mitochondria' | 'Viruses'",
    geneticCode: "number.integer>=1",
  },
  dfast: {
    "+": "reject",
    minLength: "number.integer>=0",
    useOriginalName: "boolean",
  },
  abricate: {
    "+": "reject",
    virulenceDatabase: "string>0",
    resistanceDatabase: "string>0",
  },
  homologySearch: {
    "+": "reject",
    enabled: "boolean",
    evalue: "number>0",
  },
  pangenome: {
    "+": "reject",
    plots: "boolean",
  },
  reference: {
    "+": "reject",
    id: SampleIdSchema,
  },
  executables: ExecutablesSchema,
});

export type PipelineConfig = typeof PipelineConfigSchema.infer;

export type Executables = PipelineConfig["executables"];

export type AnnotatorName = PipelineConfig["annotator"];

export type LogLevelName = PipelineConfig["logLevel"];

export type LogFormatName = PipelineConfig["logFormat"];

/**
 * Names of the sections that are merged key by key over their defaults
 */
export const CONFIG_SECTIONS = [
  "manifests",
  "trimming",
  "filtering",
  "assembly",
  "curation",
  "stats",
  "prokka",
  "dfast",
  "abricate",
  "homologySearch",
  "pangenome",
  "reference",
  "executables",
] as const satisfies readonly (keyof PipelineConfig)[];
