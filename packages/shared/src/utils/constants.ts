export const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

export const ACCESS_LEVELS = {
  none: 0,
  poor: 1,
  fair: 2,
  excellent: 3,
} as const;

export type AccessLevel = (typeof ACCESS_LEVELS)[keyof typeof ACCESS_LEVELS];

export const ALLOWED_UPLOAD_TYPES = [
  "image/jpeg",
  "image/png",
  "image/gif",
  "image/webp",
] as const;

export const UPLOAD_EXTENSIONS: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/webp": ".webp",
};

export const DEFAULT_USER_PAGE_SIZE = 100;
export const MAX_USER_PAGE_SIZE = 1000;

// metres
export const DEFAULT_NEARBY_DISTANCE = 5000;

export function isObjectId(value: string): boolean {
  return OBJECT_ID_PATTERN.test(value);
}
