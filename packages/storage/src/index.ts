export type { IFileStorage } from "./storage.interface.js";
export { LocalFileStorage } from "./local-storage.js";
