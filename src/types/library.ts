// Domain types shared by the source adapter, detector, formatter and driver

export type Author =
  | { givenName: string; familyName: string }
  | { displayName: string };

export interface Publication {
  id: string;                   // Zotero item key
  title: string;
  authors: Author[];            // Ordered as listed in the library
  itemType: string;             // e.g. "journalArticle", "preprint", "bookSection"
  journalAbbreviation?: string;
  publicationTitle?: string;
  date?: string;                // Free-text publication date as entered
  url?: string;
  doi?: string;
  createdBy?: string;           // Username of the library member who added it
  alternateLink?: string;       // Link to the item in the Zotero web library
  dateAdded?: string;           // ISO 8601, as received
  dateModified?: string;        // ISO 8601, as received
}

export interface PublicationNote {
  id: string;
  parentId: string;
  bodyHtml: string;
  dateAdded?: string;
  dateModified?: string;
}

export type TriggerReason = 'RecordDate' | 'NoteDate';

export interface ChangeSet {
  publication: Publication;
  notes: PublicationNote[];     // Cached from detection so formatting needs no fetch
  triggeringDate: Date;         // Always later than the watermark at detection time
  triggerReason: TriggerReason;
}

export interface RenderedMessage {
  plainText: string;
  htmlFragment: string;
  chatText: string;
}

export interface WatermarkRow {
  collectionId: string;
  lastProcessed: string;        // Exactly as stored; rewritten only when it advances
  lastProcessedAt: Date;
  channel: string;
}

export interface DirectoryEntry {
  displayName: string;
  destinationId: string;
}
