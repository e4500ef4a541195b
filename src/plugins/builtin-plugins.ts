import { filterDecoderPlugin } from './decoders/filter.decoder';
import { jsonDecoderPlugin } from './decoders/json.decoder';
import { noopDecoderPlugin } from './decoders/noop.decoder';
import { telemetryDecoderPlugin } from './decoders/telemetry.decoder';
import { captureInputPlugin } from './inputs/capture.input';
import { fileReadInputPlugin } from './inputs/fileread.input';
import { socketInputPlugin } from './inputs/socket.input';
import { jsonFileOutputPlugin } from './outputs/jsonfile.output';
import { measurementOutputPlugin } from './outputs/measurement.output';
import { printOutputPlugin } from './outputs/print.output';
import { sqliteOutputPlugin } from './outputs/sqlite.output';
import { AnyRegisteredPlugin } from './plugin-registry.service';

/**
 * Registration table of the plugins shipped with the pipeline.
 *
 * Inputs:
 * - fileread: lines or chunks from a file or stdin
 * - socket: TCP connections / UDP datagrams
 * - capture: passive TCP/UDP capture (live or pcap file)
 *
 * Decoders:
 * - noop, json, filter
 * - telemetry: encrypted inverter frames
 *
 * Outputs:
 * - print, jsonfile, sqlite
 * - measurement: upserts into the measurements table (PostgreSQL)
 */
export const BUILTIN_PLUGINS: readonly AnyRegisteredPlugin[] = [
  fileReadInputPlugin,
  socketInputPlugin,
  captureInputPlugin,
  noopDecoderPlugin,
  jsonDecoderPlugin,
  filterDecoderPlugin,
  telemetryDecoderPlugin,
  printOutputPlugin,
  jsonFileOutputPlugin,
  sqliteOutputPlugin,
  measurementOutputPlugin,
];
