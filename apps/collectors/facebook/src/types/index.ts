export type GraphParams = Record<string, string | number>;

export interface GraphErrorPayload {
  message: string;
  type?: string;
  code?: number;
  fbtrace_id?: string;
}

export interface GraphPaging {
  cursors?: { before?: string; after?: string };
  previous?: string;
  next?: string;
}

/**
 * One page of a cursor-paginated edge. An error payload carries `error`
 * instead of `data`.
 */
export interface GraphPage<T> {
  data?: T[];
  paging?: GraphPaging;
  error?: GraphErrorPayload;
}

export type AttachmentType =
  | "photo"
  | "video_inline"
  | "video_direct_response"
  | (string & {});

export interface GraphAttachment {
  type: AttachmentType;
  url?: string;
  media?: Record<string, unknown>;
  [field: string]: unknown;
}

export interface GraphPost {
  id: string;
  created_time?: string;
  message?: string;
  attachments?: { data: GraphAttachment[] };
  [field: string]: unknown;
}

export interface GraphUser {
  id: string;
  name?: string;
}

export interface GraphComment {
  id: string;
  // Absent when the token cannot see the author
  from?: GraphUser;
  created_time: string;
  message?: string;
  parent?: { id: string; created_time?: string; message?: string };
  attachment?: GraphAttachment;
  [field: string]: unknown;
}

export type MetricValue = number | string | Record<string, number>;

export interface RawMetric {
  id?: string;
  name: string;
  period: string;
  title?: string;
  description?: string;
  values: { value: MetricValue; end_time?: string }[];
}

export type PostType = "photo" | "video";

/**
 * Anything lines can be written to: a file stream, process.stdout, a test buffer.
 */
export interface LineSink {
  write(chunk: string): unknown;
}
