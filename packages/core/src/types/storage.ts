export interface FileStore {
  readText(path: string): Promise<string>;
  writeText(path: string, content: string): Promise<void>;
  writeBytes(path: string, data: Uint8Array): Promise<void>;
}
