/**
 * schemas.ts: zod schemas for every backend response body.
 *
 * Anything that does not match is treated as an unexpected error by the
 * gateway, so components only ever see the normalised types.
 */

import { z } from "zod";
import type { DocumentSummary } from "../types";

export const tokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
});

const documentInfoSchema = z
  .object({
    DOC_ID: z.union([z.string(), z.number()]),
    TITLE: z.string().nullish(),
    IMAGELINK: z.string().nullish(),
    PDFLINK: z.string().nullish(),
  })
  .transform(
    (doc): DocumentSummary => ({
      id: String(doc.DOC_ID),
      title: doc.TITLE || "No Title",
      imageLink: doc.IMAGELINK ?? "",
      pdfLink: doc.PDFLINK && doc.PDFLINK !== "#" ? doc.PDFLINK : null,
    })
  );

export const documentListSchema = z.array(documentInfoSchema);

export const summarySchema = z.object({ summary: z.string() });

export const embeddingsSchema = z.union([
  z.boolean(),
  z
    .object({
      ready: z.boolean().optional(),
      initialized: z.boolean().optional(),
    })
    .passthrough()
    .transform((body) => body.ready ?? body.initialized ?? true),
  // Any other 200 body (a string, null, a list) still means the call went through.
  z.unknown().transform(() => true),
]);

export const answerSchema = z.object({ response: z.string() });

export const reportSchema = z.object({ report: z.string() });

export const researchNotesSchema = z.object({
  research_notes: z.array(z.string()).default([]),
});

/** Body of a non-200 response, when the backend sends FastAPI-style detail */
export const errorBodySchema = z.object({ detail: z.string() });

/** Any body; register and the write endpoints only care about the status. */
export const anyBodySchema = z.unknown();
