const NEVER_OPENED_LABEL = "Never";
const INVALID_TIMESTAMP_LABEL = "Invalid";

export function extractLinkDomain(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./i, "");
  } catch {
    return "";
  }
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Formats a stored timestamp as local `YYYY-MM-DD HH:mm` for list columns. */
export function formatLinkTimestamp(value: string | null): string {
  if (value === null) {
    return NEVER_OPENED_LABEL;
  }

  const date = new Date(value);

  if (Number.isNaN(date.getTime())) {
    return INVALID_TIMESTAMP_LABEL;
  }

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}
