export { config } from "./env";
