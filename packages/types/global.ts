/**
 * Provenance attached to every layer of a traced record.
 */
export interface TraceMetadata {
  /**
   * Identifier of the actor that produced the layer (usually an email address).
   */
  user: string;
  /**
   * Call site that produced the layer.
   */
  source: string;
  /**
   * UTC ISO-8601 time the layer was produced.
   */
  timestamp: string;
}

export interface SerializedTraceLayer {
  data: Record<string, unknown>;
  metadata: TraceMetadata;
}

/**
 * Wire shape of a traced record, one per line in exported JSONL files.
 */
export interface SerializedTracedData {
  layers: SerializedTraceLayer[];
}
