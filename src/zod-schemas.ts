// Deadlock Detective Zod Schemas
// Structural shape of raw state input and of the persisted state document.
// Numeric rules (integers, signs, conservation) are semantic checks in
// validator.ts so that each violation can name its invariant and index.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** Schema version of the persisted document */
export const SCHEMA_VERSION = "1.0";

const Count = z.number();

const VectorSchema = z.array(Count);

const MatrixSchema = z.array(VectorSchema);

//==============================================================================
// Model
//==============================================================================

export const ProcessSchema = z.object({
	pid: Count,
	name: z.string(),
});

export const ResourceTypeSchema = z.object({
	rid: Count,
	name: z.string(),
	instances: Count,
});

/** Raw arrays accepted by createSystemState */
export const SystemStateInitSchema = z.object({
	processes: z.array(ProcessSchema),
	resourceTypes: z.array(ResourceTypeSchema),
	available: VectorSchema,
	allocation: MatrixSchema,
	request: MatrixSchema,
});

//==============================================================================
// Persisted Document
//==============================================================================

export const SystemStateDocumentSchema = SystemStateInitSchema.extend({
	schemaVersion: z.literal(SCHEMA_VERSION),
	description: z.string().optional(),
});

export type SystemStateDocument = z.infer<typeof SystemStateDocumentSchema>;
