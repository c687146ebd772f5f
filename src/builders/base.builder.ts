// ============================================================================
// BASE XML BUILDER
// Foundation helpers for all CapCorn XML builders
// ============================================================================

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

export const OTA_NAMESPACES = {
  ota: "http://www.opentravel.org/OTA/2003/05",
  xsd: "http://www.w3.org/2001/XMLSchema",
  xsi: "http://www.w3.org/2001/XMLSchema-instance",
} as const;

/**
 * Escape XML special characters
 */
export function escapeXml(value: string | number | undefined | null): string {
  if (value === undefined || value === null) return "";
  return String(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Format datetime as local ISO string without offset (CapCorn expects wall-clock time)
 */
export function formatDateTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Format a monetary amount with two decimals
 */
export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

/**
 * Conditionally include XML if value exists
 */
export function optional(value: unknown, xml: string): string {
  return value !== undefined && value !== null && value !== "" ? xml : "";
}
