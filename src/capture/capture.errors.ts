import { ConfigError, PipelineError } from '../common/pipeline.errors';

/**
 * The capture handle could not be opened: missing tool, missing privilege,
 * unknown interface, unreadable file. Fatal at startup.
 */
export class CaptureError extends ConfigError {}

/**
 * Bytes that do not follow the pcap file format.
 */
export class PcapFormatError extends PipelineError {}
