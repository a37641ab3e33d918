import type { Criteria } from "../criteria.js";

export type ListingsPayload = Omit<Criteria, "floor_only_last"> & {
  limit: number;
  offset: number;
  sort: string;
  key?: string;
};

export interface Listing {
  id: number;
  title: string;
  price?: number;
  currency: string;
  street: string;
  house: string;
  microarea: string;
  district: string;
  address: string;
  rooms?: number;
  area?: number;
  floor?: number;
  floorsTotal?: number;
  url?: string;
  photos: string[];
  raw: Record<string, unknown>;
}

export type ListingsResult = {
  items: Listing[];
  total: number;
  error?: string;
};

export interface ListingsClient {
  search(payload: ListingsPayload): Promise<ListingsResult>;
}
