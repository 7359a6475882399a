import { z } from "zod";
import type {
  Attachment,
  EnrichmentRecord,
  ScrapeRun,
  Tender,
  TenderFields,
} from "./types";

// Shapes of stored documents, used to read them back from Firestore.

const tenderFieldsSchema: z.ZodType<TenderFields> = z.object({
  title: z.string().optional(),
  amount: z.number().optional(),
  procedureType: z.string().optional(),
  category: z.string().optional(),
  placeOfExecution: z.string().optional(),
  contractingAuthority: z.string().optional(),
  cpvCodes: z.string().optional(),
  publicationDate: z.string().optional(),
  deadline: z.string().optional(),
  evaluationDate: z.string().optional(),
  status: z.string().optional(),
  sectorType: z.string().optional(),
  awardCriterion: z.string().optional(),
  contractDuration: z.string().optional(),
  numLots: z.number().optional(),
  email: z.string().optional(),
  rupName: z.string().optional(),
});

export const tenderSchema: z.ZodType<Tender> = z.object({
  identityKey: z.string(),
  platform: z.string(),
  url: z.string().nullable(),
  fields: tenderFieldsSchema,
  extras: z.record(z.string(), z.string()),
  qualityScore: z.number().min(0).max(1),
  lifecycleStatus: z.enum(["Active", "Updated", "Closed"]),
  stage: z.enum([
    "New",
    "AttachmentsReady",
    "TextExtracted",
    "AiEnriched",
    "Complete",
    "Failed",
  ]),
  failure: z
    .object({
      stage: z.enum(["AttachmentsReady", "TextExtracted", "AiEnriched"]),
      reason: z.string(),
      recoverable: z.boolean(),
      at: z.string(),
    })
    .nullable(),
  retryCount: z.number().int(),
  missingStreak: z.number().int(),
  firstSeenAt: z.string(),
  lastSeenAt: z.string(),
  lastChangedAt: z.string(),
});

// documents written before retry tracking lack the retry fields
export const attachmentSchema: z.ZodType<Attachment, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  tenderKey: z.string(),
  sourceUrl: z.string(),
  fileName: z.string(),
  category: z.enum(["Compilable", "Informative", "Unclassified"]),
  classificationConfidence: z.number(),
  downloadStatus: z.enum([
    "Pending",
    "Downloaded",
    "Failed",
    "SkippedTooLarge",
    "SkippedBadExtension",
  ]),
  localPath: z.string().nullable(),
  sizeBytes: z.number().nullable(),
  error: z.string().nullable(),
  retryable: z.boolean().default(false),
  retryCount: z.number().int().min(0).default(0),
  updatedAt: z.string(),
});

export const enrichedFieldsSchema = z.object({
  requiredQualifications: z.string(),
  evaluationCriteria: z.string(),
  processDescription: z.string(),
  deliveryMethods: z.string(),
  requiredDocumentation: z.string(),
  confidenceScore: z.number().min(0).max(1),
});

const section = z.string().nullable();

export const enrichmentRecordSchema: z.ZodType<EnrichmentRecord> = z.object({
  tenderKey: z.string(),
  platform: z.string(),
  sections: z
    .object({
      qualifications: section,
      evaluationCriteria: section,
      processDescription: section,
      deliveryTerms: section,
    })
    .nullable(),
  rawText: z.string().nullable(),
  sourceDocuments: z.array(z.string()),
  aiOutput: enrichedFieldsSchema.nullable(),
  aiSkippedReason: z.string().nullable(),
  confidenceScore: z.number().nullable(),
  failureReason: z.string().nullable(),
  extractedAt: z.string().nullable(),
  enrichedAt: z.string().nullable(),
});

const count = z.number().int().min(0);

export const scrapeRunSchema: z.ZodType<ScrapeRun> = z.object({
  id: z.string().optional(),
  platform: z.string(),
  startedAt: z.string(),
  endedAt: z.string(),
  elapsedMs: z.number(),
  status: z.enum(["Success", "Partial", "Aborted", "Failed"]),
  counts: z.object({
    found: count,
    new: count,
    updated: count,
    closed: count,
    errors: count,
  }),
  attachmentsDownloaded: count,
  enrichmentCompleted: count,
  enrichmentFailed: count,
  errorDetails: z.array(z.string()),
});
