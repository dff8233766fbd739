/**
 * Publisher Module
 */

export { Publisher, PUBLISH_INTERVAL_MS, TOP_ANSWERS } from "./publisher.js";
export { formatReport, REPORT_HEADER } from "./report.js";
export { FileSink, type OutputSink } from "./sink.js";
