/**
 * Zod schemas for runtime validation of caller input
 */

import { z } from 'zod';

// ============================================================================
// Attribute Schemas
// ============================================================================

/**
 * Property names are non-empty printable ASCII without spaces
 */
export const PropertyNameSchema = z
  .string()
  .min(1, 'Property name is required')
  .regex(/^[\x21-\x7e]+$/, 'Property name must be printable ASCII without spaces');

export const PropertyValueSchema = z.string();

export const AttributeRecordSchema = z.record(z.string(), z.string());

export const AttributeMapSchema = z.union([
  AttributeRecordSchema,
  z.instanceof(Map<string, string>),
]);

export const CacheControlSchema = z.enum(['never', 'permanent', 'volatile']);

// ============================================================================
// Context Schemas
// ============================================================================

export const DriverNameSchema = z.string().min(1, 'Driver name is required');

export const SoundContextOptionsSchema = z.object({
  backend: z
    .custom<object>((value) => typeof value === 'object' && value !== null, {
      message: 'Backend must be an object',
    })
    .optional(),
  applicationName: z.string().min(1).optional(),
  applicationId: z.string().min(1).optional(),
  driver: DriverNameSchema.optional(),
  attributes: AttributeMapSchema.optional(),
  debug: z.boolean().optional(),
});

// ============================================================================
// CLI Schemas
// ============================================================================

export const PlayCommandOptionsSchema = z
  .object({
    id: z.string().min(1).optional(),
    file: z.string().min(1).optional(),
    description: z.string().optional(),
    cacheControl: CacheControlSchema.optional(),
    volume: z.string().regex(/^-?\d+(\.\d+)?$/, 'Volume must be a number of decibels').optional(),
    loop: z.number().int().positive().default(1),
    property: z.array(z.string()).default([]),
    driver: DriverNameSchema.optional(),
    player: z.string().min(1).default('canberra-gtk-play'),
    cache: z.boolean().default(false),
  })
  .refine((options) => options.id !== undefined || options.file !== undefined, {
    message: 'Either --id or --file is required',
  });

export type PlayCommandOptions = z.infer<typeof PlayCommandOptionsSchema>;
