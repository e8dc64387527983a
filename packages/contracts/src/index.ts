export {
  METRIC_ENVELOPE_TYPE,
  SinkReportBodySchema,
  SinkReportEnvelopeSchema,
  parseSinkReport
} from "./events/sinkReport";
export type { SinkReportBody, SinkReportEnvelope } from "./events/sinkReport";
