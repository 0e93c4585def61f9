/**
 * HTTP File Upload (XEP-0363) types.
 *
 * @packageDocumentation
 * @module Types/Upload
 */

/** Upload component discovered on the server */
export interface HttpUploadService {
  jid: string
  /** Advertised max-file-size in bytes */
  maxFileSize?: number
}

export interface UploadSlot {
  putUrl: string
  getUrl: string
  /** Headers the PUT request must carry */
  headers?: Record<string, string>
}
