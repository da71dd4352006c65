import type {
  SerializedTracedData,
  SerializedTraceLayer,
} from "@social-media-tools/types/global";
import { Metadata } from "./Metadata";

interface TraceLayer {
  data: Readonly<Record<string, unknown>>;
  metadata: Metadata;
}

export interface HistoryEntry {
  value: unknown;
  metadata: Metadata;
}

/**
 * A keyed record that remembers every write made to it. Values are read from
 * the most recent layer that sets the key; earlier layers stay available
 * through `getHistory`.
 */
export class TracedData {
  private readonly layers: TraceLayer[] = [];

  constructor(data: Record<string, unknown>, metadata: Metadata) {
    this.layers.push({ data: { ...data }, metadata });
  }

  get(key: string): unknown {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i];
      if (layer && Object.prototype.hasOwnProperty.call(layer.data, key)) {
        return layer.data[key];
      }
    }
    return undefined;
  }

  has(key: string): boolean {
    return this.layers.some((layer) =>
      Object.prototype.hasOwnProperty.call(layer.data, key)
    );
  }

  keys(): string[] {
    return Object.keys(this.toObject());
  }

  items(): [string, unknown][] {
    return Object.entries(this.toObject());
  }

  toObject(): Record<string, unknown> {
    return this.layers.reduce<Record<string, unknown>>(
      (merged, layer) => ({ ...merged, ...layer.data }),
      {}
    );
  }

  /**
   * Adds a layer. Keys in `newData` shadow the current values of the same keys.
   */
  appendData(newData: Record<string, unknown>, metadata: Metadata): void {
    this.layers.push({ data: { ...newData }, metadata });
  }

  getHistory(key: string): HistoryEntry[] {
    return this.layers
      .filter((layer) => Object.prototype.hasOwnProperty.call(layer.data, key))
      .map((layer) => ({ value: layer.data[key], metadata: layer.metadata }));
  }

  get metadata(): Metadata[] {
    return this.layers.map((layer) => layer.metadata);
  }

  copy(): TracedData {
    return TracedData.deserialize(this.serialize());
  }

  serialize(): SerializedTracedData {
    const layers: SerializedTraceLayer[] = this.layers.map((layer) => ({
      data: { ...layer.data },
      metadata: layer.metadata.toJSON(),
    }));
    return { layers };
  }

  static deserialize(serialized: SerializedTracedData): TracedData {
    const [first, ...rest] = serialized.layers;
    if (!first) {
      throw new Error("Cannot deserialize TracedData without any layers");
    }

    const toMetadata = (layer: SerializedTraceLayer) =>
      new Metadata(
        layer.metadata.user,
        layer.metadata.source,
        layer.metadata.timestamp
      );

    const traced = new TracedData(first.data, toMetadata(first));
    for (const layer of rest) {
      traced.appendData(layer.data, toMetadata(layer));
    }
    return traced;
  }
}
