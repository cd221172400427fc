import type { PipelineConfig } from "./schema";

/**
 * Settings used wherever the configuration file is silent
 */
export const DEFAULT_CONFIG = {
  outputDirectory: ".",
  resume: false,
  parallelism: 1,
  threads: 4,
  logLevel: "info",
  logFormat: "pretty",
  manifests: {
    samples: "input_files.tsv",
    auxiliary: "auxiliary_files.tsv",
  },
  trimming: {
    enabled: true,
    phred: "-phred33",
    illuminaClip: "1:30:11",
  },
  filtering: {
    minLength: 40,
    minQualityMean: 25,
    trimQualityRight: 25,
    trimQualityWindow: 15,
    trimQualityType: "mean",
    outFormat: 3,
  },
  assembly: {
    mode: "--careful",
    coverageCutoff: "auto",
  },
  curation: {
    minLength: 200,
    marker: "C",
  },
  stats: {
    minContig: 200,
  },
  annotator: "prokka",
  prokka: {
    kingdom: "Bacteria",
    geneticCode: 11,
  },
  dfast: {
    minLength: 0,
    useOriginalName: true,
  },
  abricate: {
    virulenceDatabase: "vfdb",
    resistanceDatabase: "resfinder",
  },
  homologySearch: {
    enabled: true,
    evalue: 0.001,
  },
  pangenome: {
    plots: true,
  },
  reference: {
    id: "reference",
  },
  executables: {
    trimmomatic: "trimmomatic",
    prinseq: "prinseq-lite.pl",
    spades: "spades.py",
    quast: "quast.py",
    prokka: "prokka",
    dfast: "dfast",
    mlst: "mlst",
    abricate: "abricate",
    makeblastdb: "makeblastdb",
    tblastn: "tblastn",
    roary: "roary",
    roaryPlots: "roary_plots.py",
  },
} as const satisfies PipelineConfig;
