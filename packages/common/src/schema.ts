import { z } from "zod";

const SensorIdSchema = z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(v => String(v));

export const SensorSelectionSchema = z.union([z.literal("all"), z.array(SensorIdSchema).min(1)]);

const InstantInputSchema = z.union([z.string(), z.number()]).nullish();

/**
 * Body of POST /api/{vendor}/preview and /api/{vendor}/download.
 * Times are validated (and defaulted) by the service, which knows "now".
 */
export const DataRequestSchema = z.object({
	sensors: SensorSelectionSchema.default("all"),
	start_time: InstantInputSchema,
	end_time: InstantInputSchema,
	format: z.enum(["csv", "json"]).default("csv")
});

export type DataRequest = z.infer<typeof DataRequestSchema>;

export const SensorListingSchema = z.object({
	id: z.string(),
	name: z.string()
});

export type SensorListing = z.infer<typeof SensorListingSchema>;
