// Category Model - mirrors the categories table

export interface Category {
  id: string; // UUID
  name: string; // unique, trimmed and lowercased
  created_at: Date;
  updated_at: Date;
}

export interface CreateCategoryInput {
  name: string;
}
