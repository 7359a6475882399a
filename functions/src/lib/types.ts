export type LifecycleStatus = "Active" | "Updated" | "Closed";

export type EnrichmentStage =
  | "New"
  | "AttachmentsReady"
  | "TextExtracted"
  | "AiEnriched"
  | "Complete"
  | "Failed";

/** Stages a tender can fail while entering. */
export type FailableStage = "AttachmentsReady" | "TextExtracted" | "AiEnriched";

export type AttachmentCategory = "Compilable" | "Informative" | "Unclassified";

export type DownloadStatus =
  | "Pending"
  | "Downloaded"
  | "Failed"
  | "SkippedTooLarge"
  | "SkippedBadExtension";

export type ChangeOutcome = "New" | "Unchanged" | "Updated";

export type TenderFields = {
  title?: string;
  amount?: number;
  procedureType?: string;
  category?: string;
  placeOfExecution?: string;
  contractingAuthority?: string;
  cpvCodes?: string; // comma-separated, sorted
  publicationDate?: string; // ISO
  deadline?: string; // ISO
  evaluationDate?: string; // ISO
  status?: string; // as reported by the platform
  sectorType?: string;
  awardCriterion?: string;
  contractDuration?: string;
  numLots?: number;
  email?: string;
  rupName?: string;
};

export type TenderFieldName = keyof TenderFields;

export type StageFailure = {
  stage: FailableStage;
  reason: string;
  recoverable: boolean;
  at: string;
};

export type Tender = {
  identityKey: string;
  platform: string;
  url: string | null;
  fields: TenderFields;
  extras: Record<string, string>;
  qualityScore: number; // [0,1]
  lifecycleStatus: LifecycleStatus;
  stage: EnrichmentStage;
  failure: StageFailure | null;
  retryCount: number;
  missingStreak: number;
  firstSeenAt: string;
  lastSeenAt: string;
  lastChangedAt: string;
};

export type Attachment = {
  id: string; // hash of sourceUrl
  tenderKey: string;
  sourceUrl: string;
  fileName: string;
  category: AttachmentCategory;
  classificationConfidence: number;
  downloadStatus: DownloadStatus;
  localPath: string | null; // set iff Downloaded
  sizeBytes: number | null;
  error: string | null;
  /** Last failure was transient (timeout, network, 429/5xx). */
  retryable: boolean;
  retryCount: number;
  updatedAt: string;
};

export type SectionName =
  | "qualifications"
  | "evaluationCriteria"
  | "processDescription"
  | "deliveryTerms";

export type MergedSections = Record<SectionName, string | null>;

export type EnrichedFields = {
  requiredQualifications: string;
  evaluationCriteria: string;
  processDescription: string;
  deliveryMethods: string;
  requiredDocumentation: string;
  confidenceScore: number;
};

export type EnrichmentRecord = {
  tenderKey: string;
  platform: string;
  sections: MergedSections | null;
  rawText: string | null;
  sourceDocuments: string[];
  aiOutput: EnrichedFields | null;
  aiSkippedReason: string | null;
  confidenceScore: number | null;
  failureReason: string | null;
  extractedAt: string | null;
  enrichedAt: string | null;
};

export type RunStatus = "Success" | "Partial" | "Aborted" | "Failed";

export type ScrapeRunCounts = {
  found: number;
  new: number;
  updated: number;
  closed: number;
  errors: number;
};

export type ScrapeRun = {
  id?: string;
  platform: string;
  startedAt: string;
  endedAt: string;
  elapsedMs: number;
  status: RunStatus;
  counts: ScrapeRunCounts;
  attachmentsDownloaded: number;
  enrichmentCompleted: number;
  enrichmentFailed: number;
  errorDetails: string[];
};
