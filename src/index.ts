/**
 * vtt-scan
 *
 * Streaming WebVTT scanner with a strict grammar and explicit outcomes.
 *
 * Import from subpath exports:
 *   import { parseVtt, VttScanner } from "vtt-scan/vtt";
 *   import { createScanLogger } from "vtt-scan/logging";
 *
 * @packageDocumentation
 */

export * from './vtt/index.ts'
