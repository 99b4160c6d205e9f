/**
 * Siril capability interface
 * Everything the pipeline asks of Siril
 */

export interface SirilClient {
  openSession(): Promise<void>;
  closeSession(): Promise<void>;
  changeDirectory(path: string): Promise<void>;
  runScript(path: string): Promise<void>;
}
