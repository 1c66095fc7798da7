/**
 * GPX Upload Middleware
 * multipart/form-data parsing for track uploads, kept entirely in memory
 *
 * Files land in req.files as Buffers; nothing touches the disk.
 * Only ".gpx" names are accepted, and UPLOAD limits bound size and count.
 *
 * Usage in routes:
 *   router.post("/gpx", uploadGpx.array("gpx", UPLOAD.MAX_FILES), handleMulterError, handler)
 */

import multer from "multer";
import path from "path";
import { Request, Response, NextFunction } from "express";
import { UPLOAD, ERROR_CODES } from "../config/constants.js";

const maxSizeMb = UPLOAD.MAX_FILE_SIZE_BYTES / (1024 * 1024);

export const uploadGpx = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: UPLOAD.MAX_FILE_SIZE_BYTES,
    files: UPLOAD.MAX_FILES,
  },
  fileFilter: (req, file, cb) => {
    if (path.extname(file.originalname).toLowerCase() === ".gpx") {
      cb(null, true);
      return;
    }
    cb(new UnsupportedFileTypeError(file.originalname));
  },
});

/**
 * Turn upload failures into 400 responses; anything else goes to the next handler
 *
 * Must follow uploadGpx in the chain.
 */
export function handleMulterError(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (error instanceof UnsupportedFileTypeError) {
    res.status(400).json({
      success: false,
      error: error.message,
      code: ERROR_CODES.GPX_INVALID_FORMAT,
    });
    return;
  }

  if (error instanceof multer.MulterError) {
    const tooLarge = error.code === "LIMIT_FILE_SIZE";
    res.status(400).json({
      success: false,
      error: tooLarge
        ? `${error.field ?? "File"} exceeds the ${maxSizeMb}MB limit`
        : `Upload rejected: ${error.message}`,
      code: tooLarge ? ERROR_CODES.GPX_FILE_TOO_LARGE : ERROR_CODES.GPX_INVALID_FORMAT,
    });
    return;
  }

  next(error);
}

/**
 * A file without the .gpx extension was uploaded
 */
export class UnsupportedFileTypeError extends Error {
  constructor(fileName: string) {
    super(`Only .gpx files are allowed (got "${fileName}")`);
    this.name = "UnsupportedFileTypeError";
  }
}
