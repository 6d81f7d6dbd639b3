/** Read access to the place uploaded PDFs are kept. */
export interface IFileStorage {
  read(path: string): Promise<Uint8Array>;
}
