import { z } from "zod";

export const METRIC_ENVELOPE_TYPE = "exometer_metric";

export const SinkReportBodySchema = z.object({
  name: z.string().min(1),
  value: z.unknown(),
  timestamp: z.number().int().nonnegative(),
  host: z.string(),
  instance: z.string()
}).strict();

export const SinkReportEnvelopeSchema = z.object({
  type: z.literal(METRIC_ENVELOPE_TYPE),
  body: SinkReportBodySchema
}).strict();

export type SinkReportBody = z.infer<typeof SinkReportBodySchema>;
export type SinkReportEnvelope = z.infer<typeof SinkReportEnvelopeSchema>;

/** Decode a request body as received by a sink. */
export const parseSinkReport = (payload: string): SinkReportEnvelope =>
  SinkReportEnvelopeSchema.parse(JSON.parse(payload));
