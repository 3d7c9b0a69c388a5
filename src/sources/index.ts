import { MemoryLayer } from "./layers/memory";
import { SqliteLayer } from "./layers/sqlite";

/**
 * Storage layer factories.
 * Use these with `tabula.session(layer, ...)` or via `tabula.layers.*`.
 */
const layers = {
  /** Create an in-process layer; nothing outlives the process. */
  memory: (identifier?: string): MemoryLayer => new MemoryLayer(identifier),
  /** Create a SQLite layer backed by a local file path (or `:memory:`). */
  sqlite: (path: string): SqliteLayer => new SqliteLayer(path),
};

export { layers, MemoryLayer, SqliteLayer };
