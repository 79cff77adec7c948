export type SquirrelId = number;

export interface SquirrelRecord {
  id: SquirrelId;   // assigned by the store, never reused
  name: string;
  size: string;
}

// Write inputs carry no id; the store assigns it
export interface SquirrelFields {
  name: string;
  size: string;
}
