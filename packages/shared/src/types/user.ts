export interface User {
  id: string;
  name: string;
  cafes_visited: number;
  average_rating: number;
  /** Blob URL of the uploaded picture, if any. */
  profile_picture: string | null;
  created_at: string;
  updated_at: string;
}

export interface LoginResponse {
  message: string;
  user_id: string;
  user_name: string;
}

export interface ProfilePictureResponse {
  message: string;
  filename: string;
}
