export const CLI_NAME = "mediasync";

export const DEFAULT_DB_FILE = `${CLI_NAME}.db`;

// Extensions are matched case-insensitively and always carry the leading dot.
export const DEFAULT_MEDIA_EXTENSIONS: readonly string[] = [
  // images
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".bmp",
  ".tiff",
  ".webp",
  ".heic",
  // video
  ".mp4",
  ".avi",
  ".mkv",
  ".mov",
  ".wmv",
  ".flv",
  ".webm",
  // audio
  ".mp3",
  ".wav",
  ".flac",
  ".aac",
  ".ogg",
  ".wma",
];

export const DUPLICATE_MARKER = "_DUP";

// number of recent errors printed in the end-of-run report
export const REPORT_ERROR_TAIL = 5;
