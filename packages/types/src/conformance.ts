import { z } from 'zod';
import { JsonValueSchema } from './value.js';

export const ConformanceCaseSchema = z.tuple([JsonValueSchema, JsonValueSchema, JsonValueSchema]);
export type ConformanceCase = z.infer<typeof ConformanceCaseSchema>;

/**
 * A suite is a flat list of `[rule, data, expected]` cases. Plain strings
 * start a new section; every case after one belongs to it.
 */
export const ConformanceSuiteSchema = z.array(z.union([z.string(), ConformanceCaseSchema]));
export type ConformanceSuite = z.infer<typeof ConformanceSuiteSchema>;
