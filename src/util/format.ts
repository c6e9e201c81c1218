/**
 * Display helpers for CLI output
 */

export function truncate(text: string, max: number, suffix = "..."): string {
  if (text.length <= max) {
    return text;
  }
  if (max <= suffix.length) {
    return suffix.slice(0, Math.max(0, max));
  }
  return text.slice(0, max - suffix.length) + suffix;
}

export function formatFileSize(sizeBytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = sizeBytes;
  for (const unit of units) {
    if (size < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

/**
 * First 8 and last 4 characters of a secret
 */
export function maskSecret(secret: string | undefined): string {
  if (!secret) {
    return "(not set)";
  }
  if (secret.length <= 12) {
    return "*".repeat(secret.length);
  }
  return `${secret.slice(0, 8)}...${secret.slice(-4)}`;
}

/**
 * Single-line preview of multi-line text
 */
export function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
