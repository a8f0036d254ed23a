export interface DocumentRecord {
  path: string;
  bytes: number;
}

export interface QueryHit {
  distance: number;
  position: number;
  document: DocumentRecord;
}

export interface RetrievedContext {
  path: string;
  distance: number;
  text: string;
}
