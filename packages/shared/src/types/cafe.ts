import type { AccessLevel } from "../utils/constants.js";

export interface Address {
  street: string;
  city: string;
  state: string;
  zip_code: string;
  country: string;
}

export interface GeoPoint {
  type: "Point";
  /** [longitude, latitude] */
  coordinates: [number, number];
}

export interface Cafe {
  id: string;
  name: string;
  address: Address;
  location: GeoPoint;
  phone: string | null;
  website: string | null;
  opening_hours: Record<string, string> | null;
  amenities: string[];
  thumbnail_url: string | null;
  wifi_access: AccessLevel;
  outlet_accessibility: AccessLevel;
  average_rating: number;
  created_at: string;
  updated_at: string;
}
