export { MongoUuidTable } from "./mongoUuidTable";
export type { UuidTable } from "./uuidTable";
