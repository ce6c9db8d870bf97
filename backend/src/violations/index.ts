export { ViolationReporter, createLoggingSink, createCompositeSink } from "./reporter";

export type { ViolationSink, ViolationEventInput } from "./reporter";
