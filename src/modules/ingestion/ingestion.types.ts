import { RecordId } from '../../database/entities';

/**
 * 一条待处理的媒体：直接上传的字节或远程 URL
 */
export type SubmissionItem =
  | { kind: 'upload'; data: Buffer; contentType?: string; filename?: string }
  | { kind: 'url'; url: string };

export interface SubmitterAddress {
  address1?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
}

export interface Submitter {
  name: string;
  phone: string;
  address?: SubmitterAddress;
}

export interface ItemFailure {
  index: number;
  code: string;
  message: string;
}

export interface BatchResult {
  uploadNumber: number;
  transcriptIds: RecordId[];
  failedCount: number;
  failures: ItemFailure[];
}
