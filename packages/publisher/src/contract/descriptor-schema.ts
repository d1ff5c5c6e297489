/**
 * Data Product Descriptor Schema
 *
 * Zod schema for the parts of a data product descriptor the publisher reads.
 * Unknown fields are passed through untouched; descriptors usually carry much
 * more (owners, SLAs, documentation) than the publisher needs.
 *
 * @module contract/descriptor-schema
 */

import { z } from 'zod';

/**
 * Rule thresholds may be written as numbers or numeric strings ("0")
 */
const ThresholdSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'Threshold must be numeric')
    .transform(Number),
]);

export const QualityRuleEntrySchema = z
  .object({
    rule: z.string().min(1, 'Rule name must not be empty'),
    mustBeEqualTo: ThresholdSchema.optional(),
    mustBeLessThan: ThresholdSchema.optional(),
    unit: z.string().optional(),
  })
  .passthrough();

const CatalogInfoSchema = z
  .object({
    namespace: z.string().min(1),
    branch: z.string().min(1),
  })
  .passthrough();

const TableDefinitionSchema = z
  .object({
    name: z.string().min(1).optional(),
    quality: z.array(QualityRuleEntrySchema),
    properties: z.record(
      z
        .object({
          quality: z.array(QualityRuleEntrySchema).optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();

const OutputPortSchema = z
  .object({
    promises: z.object({
      api: z.object({
        definition: z.object({
          schema: z
            .object({
              databaseName: z.string().min(1),
              tables: z.array(TableDefinitionSchema).min(1, 'At least one table is required'),
            })
            .passthrough(),
          services: z.object({
            production: z.object({
              catalogInfo: CatalogInfoSchema,
            }),
          }),
        }),
      }),
    }),
  })
  .passthrough();

/**
 * Input ports are optional; when present their namespace is checked against
 * the output namespace
 */
const InputPortSchema = z
  .object({
    promises: z
      .object({
        api: z
          .object({
            definition: z
              .object({
                services: z
                  .object({
                    production: z
                      .object({
                        catalogInfo: z
                          .object({ namespace: z.string().min(1).optional() })
                          .passthrough()
                          .optional(),
                      })
                      .passthrough()
                      .optional(),
                  })
                  .passthrough()
                  .optional(),
              })
              .passthrough()
              .optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const DataProductDescriptorSchema = z
  .object({
    interfaceComponents: z
      .object({
        inputPorts: z.array(InputPortSchema).optional(),
        outputPorts: z.array(OutputPortSchema).min(1, 'At least one output port is required'),
      })
      .passthrough(),
    internalComponents: z
      .object({
        applicationComponents: z
          .array(
            z
              .object({
                configs: z
                  .object({
                    project_folder: z.string().min(1),
                  })
                  .passthrough(),
              })
              .passthrough()
          )
          .min(1, 'At least one application component is required'),
      })
      .passthrough(),
  })
  .passthrough();

export type DataProductDescriptor = z.infer<typeof DataProductDescriptorSchema>;
export type QualityRuleEntry = z.infer<typeof QualityRuleEntrySchema>;
