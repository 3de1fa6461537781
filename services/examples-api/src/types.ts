export type ExampleId = string;

export interface ExampleRecord {
  id: ExampleId;
  name: string;
  description: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

// Write inputs: id and timestamps are owned by the store
export interface NewExample {
  name: string;
  description: string;
  is_active: boolean;
}

export type ExamplePatch = Partial<NewExample>;
