/**
 * Zod schemas for the media API.
 * Request validation and the OpenAPI document are both built from these.
 */

import { z } from 'zod';
import { MEDIA_FORMATS } from './db/db.js';

const FORMAT_HINT = `Invalid format. Use one of: ${MEDIA_FORMATS.join(', ')}`;

function requiredText(field: string, description: string) {
    return z
        .string({
            required_error: `${field} is required`,
            invalid_type_error: `${field} must be a string`,
        })
        .trim()
        .min(1, `${field} must not be empty`)
        .describe(description);
}

export const mediaFormatSchema = z
    .enum(MEDIA_FORMATS, {
        errorMap: (issue, ctx) => {
            if (issue.code === 'invalid_type' && ctx.data === undefined) return { message: 'format is required' };
            return { message: FORMAT_HINT };
        },
    })
    .describe('Media format');

export const createMediaSchema = z.object({
    title: requiredText('title', 'Media title'),
    artist: requiredText('artist', 'Artist name'),
    location: requiredText('location', 'Storage location'),
    format: mediaFormatSchema,
});

export const mediaItemSchema = z.object({
    id: z.number().int().describe('Unique identifier assigned by the store'),
    title: z.string(),
    artist: z.string(),
    location: z.string(),
    format: mediaFormatSchema,
});

export const mediaListSchema = z.array(mediaItemSchema);

export const searchQuerySchema = z.object({
    query: z
        .string({ required_error: "Missing 'query' parameter", invalid_type_error: "'query' must be a single value" })
        .trim()
        .min(1, "Missing 'query' parameter")
        .describe('Search term for title, artist, location, or format'),
});

export const mediaIdParamsSchema = z.object({
    id: z
        .string({ invalid_type_error: 'id must be a positive integer' })
        .regex(/^[1-9]\d*$/, 'id must be a positive integer')
        .transform(Number)
        .describe('The unique ID of the media'),
});

export const deleteResponseSchema = z.object({
    message: z.string().describe('Confirmation message after deletion'),
});

export const errorResponseSchema = z.object({
    error: z.string().describe('Error message describing what went wrong'),
    code: z.number().int().describe('HTTP status code for the error'),
    details: z
        .record(z.array(z.string()))
        .optional()
        .describe('Validation messages keyed by field'),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;
