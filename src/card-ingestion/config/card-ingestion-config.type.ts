export type CardSourceKind = 'drive' | 'imap';

export type CardIngestionConfig = {
  source: CardSourceKind;
  drive: {
    folderId?: string;
    pageSize: number;
  };
  imap: {
    host?: string;
    port: number;
    secure: boolean;
    user?: string;
    password?: string;
    mailbox: string;
    lookbackDays: number;
  };
  allowedMimeTypes: string[];
  maxFileSizeMb: number;
  concurrency: number;
  scheduleEnabled: boolean;
  extraction: {
    acceptanceThreshold: number;
    minConfidence: number;
  };
  mailchimp: {
    apiKey?: string;
    serverPrefix?: string;
    listId?: string;
    tag: string;
    timeoutMs: number;
  };
};
