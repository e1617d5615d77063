import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { z } from 'zod';

const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const metadataFilterSchema = z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/), scalarSchema);

export const chunkMetadataSchema = z.record(z.union([scalarSchema, z.array(scalarSchema), z.null()]));

/**
 * Equality filter: identifier keys mapped to string, number or boolean values.
 */
export function IsMetadataFilter(validationOptions?: ValidationOptions): PropertyDecorator {
    return ValidateBy(
        {
            name: 'isMetadataFilter',
            validator: {
                validate: (value: unknown) => metadataFilterSchema.safeParse(value).success,
                defaultMessage: buildMessage(
                    (eachPrefix) => `${eachPrefix}$property must map identifier keys to string, number or boolean values`,
                    validationOptions,
                ),
            },
        },
        validationOptions,
    );
}

/**
 * Chunk metadata: scalar values, arrays of scalars, or null.
 */
export function IsChunkMetadata(validationOptions?: ValidationOptions): PropertyDecorator {
    return ValidateBy(
        {
            name: 'isChunkMetadata',
            validator: {
                validate: (value: unknown) => chunkMetadataSchema.safeParse(value).success,
                defaultMessage: buildMessage(
                    (eachPrefix) => `${eachPrefix}$property values must be scalars, arrays of scalars or null`,
                    validationOptions,
                ),
            },
        },
        validationOptions,
    );
}
