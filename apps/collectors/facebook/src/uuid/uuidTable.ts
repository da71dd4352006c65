/**
 * Maps platform identifiers to stable pseudonymous identifiers and back.
 */
export interface UuidTable {
  dataToUuidBatch(data: Iterable<string>): Promise<Record<string, string>>;
  uuidToDataBatch(uuids: Iterable<string>): Promise<Record<string, string>>;
}
