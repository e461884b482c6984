/**
 * Notification model - the immutable value handed to every delivery endpoint
 */

export const NOTIFY_TYPES = ['info', 'success', 'warning', 'error'] as const;
export type NotifyType = (typeof NOTIFY_TYPES)[number];

export const BODY_FORMATS = ['text', 'html', 'markdown'] as const;
export type BodyFormat = (typeof BODY_FORMATS)[number];

/**
 * Opaque reference to attachment content. The core never reads it; endpoints
 * that support attachments call `read()` when they build their request.
 */
export interface AttachmentHandle {
  readonly name: string;
  readonly mimeType?: string;
  read(): Promise<Buffer>;
}

export interface Notification {
  readonly title: string;
  readonly body: string;
  readonly type: NotifyType;
  readonly tags: ReadonlySet<string>;
  readonly body_format?: BodyFormat;
  readonly attachment?: AttachmentHandle;
  readonly source_url?: string;
}

export interface CreateNotificationData {
  title: string;
  body: string;
  type?: NotifyType;
  tags?: Iterable<string>;
  body_format?: BodyFormat;
  attachment?: AttachmentHandle;
  source_url?: string;
}

export const createNotification = (
  data: CreateNotificationData,
): Notification =>
  Object.freeze({
    title: data.title,
    body: data.body,
    type: data.type ?? 'info',
    tags: new Set(data.tags ?? []),
    body_format: data.body_format,
    attachment: data.attachment,
    source_url: data.source_url,
  });
