const MAX_TITLE_ID = 0xffff_ffff;

/** Percent-encode everything outside the RFC 3986 unreserved set. */
export function encodeLaunchParams(params: string): string {
  return encodeURIComponent(params).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Build the launch target for a title: `ms-xbl-<8 hex digits>://default`,
 * followed by `/<params>` when params are not blank.
 */
export function buildTitleUri(titleId: number, launchParams?: string): string {
  if (!Number.isInteger(titleId) || titleId < 0 || titleId > MAX_TITLE_ID) {
    throw new RangeError(`Title id must be an unsigned 32-bit integer, got ${titleId}`);
  }
  const hex = titleId.toString(16).toUpperCase().padStart(8, "0");
  const base = `ms-xbl-${hex}://default`;
  if (launchParams === undefined || launchParams.trim() === "") return base;
  return `${base}/${encodeLaunchParams(launchParams)}`;
}
