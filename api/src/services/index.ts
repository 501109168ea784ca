import { KeyedLock } from "../lib/keyedLock.js";
import type { BlobStore } from "../storage/blobStore.js";
import type { Stores } from "../store/types.js";
import { createBookmarkEnrichment, type BookmarkEnrichment } from "./bookmarkEnrichment.js";
import { createBookmarkService, type BookmarkService } from "./bookmarkService.js";
import { createCafeService, type CafeService } from "./cafeService.js";
import { createFileService, type FileService } from "./fileService.js";
import { createReviewService, type ReviewService } from "./reviewService.js";
import { createUserService, type UserService } from "./userService.js";

export interface Services {
  bookmarks: BookmarkService;
  bookmarkEnrichment: BookmarkEnrichment;
  users: UserService;
  cafes: CafeService;
  reviews: ReviewService;
  files: FileService;
}

export function createServices({
  stores,
  blobs,
  now,
}: {
  stores: Stores;
  blobs: BlobStore;
  now?: () => Date;
}): Services {
  // One lock table per process; keys are namespaced per service.
  const locks = new KeyedLock();
  return {
    bookmarks: createBookmarkService({ stores, locks, now }),
    bookmarkEnrichment: createBookmarkEnrichment({ stores }),
    users: createUserService({ stores, blobs, locks }),
    cafes: createCafeService({ stores }),
    reviews: createReviewService({ stores, locks }),
    files: createFileService({ blobs }),
  };
}
