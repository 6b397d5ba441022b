export type NoteId = string;
export type Owner = string;

export interface NoteRecord {
  owner: Owner;      // partition key
  id: NoteId;        // sort key
  title: string;
  note: string;
  created_at: string; // ISO-8601, UTC
  updated_at: string;
}

// Fields a caller may change on an existing note
export interface NoteUpdate {
  title: string;
  note: string;
  updated_at: string;
}

export interface NotePayload {
  title: string;
  note: string;
}
