import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
    createMediaSchema,
    deleteResponseSchema,
    errorResponseSchema,
    mediaIdParamsSchema,
    mediaItemSchema,
    mediaListSchema,
    searchQuerySchema,
} from './schemas.js';
import { SAMPLE_MEDIA } from './db/seed.js';

type JsonSchema = ReturnType<typeof zodToJsonSchema>;

type MediaTypeObject = { schema: JsonSchema; example?: unknown };

type ResponseObject = {
    description: string;
    content?: Record<string, MediaTypeObject>;
};

type ParameterObject = {
    name: string;
    in: 'query' | 'path';
    required: boolean;
    description?: string;
    schema: JsonSchema;
};

type OperationObject = {
    tags: string[];
    summary: string;
    operationId: string;
    parameters?: ParameterObject[];
    requestBody?: { required: boolean; content: Record<string, MediaTypeObject> };
    responses: Record<string, ResponseObject>;
};

export type OpenApiDocument = {
    openapi: string;
    info: { title: string; version: string; description: string };
    tags: { name: string; description: string }[];
    paths: Record<string, Record<string, OperationObject>>;
};

function toJsonSchema(schema: ZodTypeAny): JsonSchema {
    return zodToJsonSchema(schema, { target: 'openApi3', $refStrategy: 'none' });
}

function json(description: string, schema: ZodTypeAny): ResponseObject {
    return { description, content: { 'application/json': { schema: toJsonSchema(schema) } } };
}

const badRequest = json('Missing or invalid input', errorResponseSchema);
const notFound = json('Media not found', errorResponseSchema);
const internalError = json('Internal server error', errorResponseSchema);

const idParam: ParameterObject = {
    name: 'id',
    in: 'path',
    required: true,
    description: mediaIdParamsSchema.shape.id.description,
    schema: toJsonSchema(mediaIdParamsSchema.shape.id),
};

/**
 * OpenAPI 3 description of the media routes, generated from the same zod
 * schemas the handlers validate with.
 */
export function buildOpenApiDocument(): OpenApiDocument {
    return {
        openapi: '3.0.3',
        info: {
            title: 'Media Shelf API',
            version: '1.1.0',
            description: 'Store and search metadata for a collection of CDs, vinyl and tapes',
        },
        tags: [{ name: 'media', description: 'Media end points' }],
        paths: {
            '/media': {
                get: {
                    tags: ['media'],
                    summary: 'List all media',
                    operationId: 'listMedia',
                    responses: {
                        200: json('All media in the collection', mediaListSchema),
                        500: internalError,
                    },
                },
                post: {
                    tags: ['media'],
                    summary: 'Add a new media item',
                    operationId: 'createMedia',
                    requestBody: {
                        required: true,
                        content: {
                            'application/json': { schema: toJsonSchema(createMediaSchema), example: SAMPLE_MEDIA[0] },
                        },
                    },
                    responses: {
                        201: json('Media successfully added', mediaItemSchema),
                        400: badRequest,
                        500: internalError,
                    },
                },
            },
            '/media/search': {
                get: {
                    tags: ['media'],
                    summary: 'Search media by title, artist, location, or format',
                    operationId: 'searchMedia',
                    parameters: [
                        {
                            name: 'query',
                            in: 'query',
                            required: true,
                            description: searchQuerySchema.shape.query.description,
                            schema: toJsonSchema(searchQuerySchema.shape.query),
                        },
                    ],
                    responses: {
                        200: json('Media matching the search term', mediaListSchema),
                        400: badRequest,
                        500: internalError,
                    },
                },
            },
            '/media/{id}': {
                get: {
                    tags: ['media'],
                    summary: 'Get a media item by its ID',
                    operationId: 'getMedia',
                    parameters: [idParam],
                    responses: {
                        200: json('The media item', mediaItemSchema),
                        400: badRequest,
                        404: notFound,
                        500: internalError,
                    },
                },
                delete: {
                    tags: ['media'],
                    summary: 'Delete a media item by its ID',
                    operationId: 'deleteMedia',
                    parameters: [idParam],
                    responses: {
                        200: json('Deleted successfully', deleteResponseSchema),
                        400: badRequest,
                        404: notFound,
                        500: internalError,
                    },
                },
            },
        },
    };
}
