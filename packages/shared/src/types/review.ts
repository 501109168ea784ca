export interface Photo {
  id: string;
  url: string;
  caption: string | null;
}

export interface Review {
  id: string;
  study_spot_id: string;
  user_id: string;
  overall_rating: number;
  outlet_accessibility: number;
  wifi_quality: number;
  atmosphere: string | null;
  energy_level: string | null;
  study_friendly: string | null;
  photos: Photo[];
  created_at: string;
  updated_at: string;
}
