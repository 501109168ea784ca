export * from "./types/user.js";
export * from "./types/cafe.js";
export * from "./types/review.js";
export * from "./types/bookmark.js";
export * from "./utils/constants.js";
export * from "./utils/validation.js";
