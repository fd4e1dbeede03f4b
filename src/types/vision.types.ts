import { z } from 'zod';

// Google Cloud Vision `images:annotate` REST shapes (only the fields we use)

export type VisionFeatureType = 'TEXT_DETECTION' | 'DOCUMENT_TEXT_DETECTION';

export interface VisionAnnotateRequest {
  requests: Array<{
    image: { content: string };
    features: Array<{ type: VisionFeatureType; maxResults?: number }>;
    imageContext?: { languageHints: string[] };
  }>;
}

const visionStatusSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
});

const visionEntityAnnotationSchema = z.object({
  locale: z.string().optional(),
  description: z.string().optional(),
});

export const visionAnnotateImageResponseSchema = z.object({
  textAnnotations: z.array(visionEntityAnnotationSchema).optional(),
  fullTextAnnotation: z.object({ text: z.string().optional() }).optional(),
  error: visionStatusSchema.optional(),
});

export const visionAnnotateResponseSchema = z.object({
  responses: z.array(visionAnnotateImageResponseSchema).optional(),
});

