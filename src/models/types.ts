
export const RARITIES = ["common", "rare", "epic", "legendary"] as const;
export type Rarity = (typeof RARITIES)[number];

export const isRarity = (value: string): value is Rarity =>
  RARITIES.some((rarity) => rarity === value);

export interface User {
  id: number;
  telegram_id: number; // platform id, immutable
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  balance: number;
  total_spent: number;
  cases_opened: number;
  created_at: Date;
  updated_at: Date;
}

export interface Item {
  id: number;
  name: string;
  description: string | null;
  rarity: Rarity;
  price: number;
  image_url: string | null;
  is_active: boolean;
  created_at: Date;
}

export interface Case {
  id: number;
  name: string;
  description: string | null;
  price: number;
  image_url: string | null;
  is_active: boolean;
  created_at: Date;
}

// Weights are relative, they never need to sum to 1
export interface CaseContent {
  id: number;
  case_id: number;
  item_id: number;
  weight: number;
  is_active: boolean;
}

export interface InventoryEntry {
  id: number;
  user_id: number;
  item_id: number;
  is_sold: boolean;
  sold_price: number | null; // set only when sold
  case_id: number | null; // nulled if the source case is deleted
  created_at: Date;
}

export interface OpeningRecord {
  id: number;
  user_id: number;
  case_id: number;
  item_id: number;
  spent: number;
  created_at: Date;
}

export interface Identity {
  telegram_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
}

export interface CaseContentWithItem {
  content: CaseContent;
  item: Item;
}

export interface DrawCandidate {
  item: Item;
  weight: number;
}

export interface CaseListing extends Case {
  contents: Array<DrawCandidate & { chance: number }>;
}

export interface InventoryView extends InventoryEntry {
  item: Item;
}

export interface HistoryView extends OpeningRecord {
  case_name: string;
  item: Item;
}

export interface OpenCaseOutcome {
  item: Item;
  entry: InventoryEntry;
  balance: number;
}

export interface SellOutcome {
  proceeds: number;
  balance: number;
}
