import { UnknownIdentifierError } from "@/errors";
import { logger } from "@/lib/logger";
import { UuidMapping } from "@/models/uuidMapping";
import { v4 as uuidv4 } from "uuid";
import { UuidTable } from "./uuidTable";

export class MongoUuidTable implements UuidTable {
  constructor(
    private readonly tableName: string,
    private readonly uuidPrefix: string
  ) {}

  /**
   * Returns the uuid for every item in `data`, minting and storing new uuids
   * for items this table has never seen. Concurrent callers agree on the uuid
   * of an item.
   */
  async dataToUuidBatch(
    data: Iterable<string>
  ): Promise<Record<string, string>> {
    const wanted = [...new Set(data)];
    if (wanted.length === 0) return {};

    const existing = await UuidMapping.find({
      table: this.tableName,
      data: { $in: wanted },
    })
      .lean()
      .exec();

    const lut: Record<string, string> = {};
    for (const mapping of existing) {
      lut[mapping.data] = mapping.uuid;
    }

    const unseen = wanted.filter((item) => lut[item] === undefined);
    if (unseen.length > 0) {
      // $setOnInsert keeps whichever uuid was stored first when another run
      // mints one for the same item concurrently
      const result = await UuidMapping.bulkWrite(
        unseen.map((item) => ({
          updateOne: {
            filter: { table: this.tableName, data: item },
            update: {
              $setOnInsert: { uuid: `${this.uuidPrefix}${uuidv4()}` },
            },
            upsert: true,
          },
        })),
        { ordered: false }
      );
      logger.info(`Created ${result.upsertedCount} new uuids`, {
        table: this.tableName,
      });

      const stored = await UuidMapping.find({
        table: this.tableName,
        data: { $in: unseen },
      })
        .lean()
        .exec();
      for (const mapping of stored) {
        lut[mapping.data] = mapping.uuid;
      }

      const missing = unseen.find((item) => lut[item] === undefined);
      if (missing !== undefined) {
        throw new UnknownIdentifierError(missing);
      }
    }

    return lut;
  }

  async uuidToDataBatch(
    uuids: Iterable<string>
  ): Promise<Record<string, string>> {
    const wanted = [...new Set(uuids)];
    if (wanted.length === 0) return {};

    const mappings = await UuidMapping.find({
      table: this.tableName,
      uuid: { $in: wanted },
    })
      .lean()
      .exec();

    const lut: Record<string, string> = {};
    for (const mapping of mappings) {
      lut[mapping.uuid] = mapping.data;
    }

    const missing = wanted.find((uuid) => lut[uuid] === undefined);
    if (missing !== undefined) {
      throw new UnknownIdentifierError(missing);
    }

    return lut;
  }
}
