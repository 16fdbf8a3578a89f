import { createLogger } from "@plasticscm-setup/logger";
import { DEFAULT_DOWNLOAD_URL } from "./config.js";
import { InstallError, formatError } from "./errors.js";
import type {
  ArchiveComponent,
  ReleaseChannel,
  ReleaseInfo,
  ReleaseSource,
} from "./types.js";
import { isValidVersion } from "./version.js";

const log = createLogger("installer:release");

/** Listing page of each channel, relative to the downloads base URL. */
export const LISTING_PATHS: Record<ReleaseChannel, string> = {
  stable: "",
  labs: "/labs",
};

const SECTION_MARKER = /data-channel\s*=\s*["'](stable|labs)["']/gi;

// "Version:" label, then the value in a <span> on the next line.
const VERSION_ENTRY = /Version:[^\n]*\r?\n\s*<span>\s*([^\s<]+)/;

const CLIENT_ARCHIVE_LINK = /href\s*=\s*["']([^"']*\/downloadinstaller\/[^"']*clientzip[^"']*)["']/i;

export function listingUrl(channel: ReleaseChannel, baseUrl: string = DEFAULT_DOWNLOAD_URL): string {
  return `${baseUrl}${LISTING_PATHS[channel]}`;
}

export function buildArchiveUrl(
  baseUrl: string,
  version: string,
  component: ArchiveComponent,
): string {
  return `${baseUrl}/downloadinstaller/${encodeURIComponent(version)}/plasticscm/linux/${component}zip?Flags=None`;
}

/**
 * Return the part of the page that belongs to the given channel.
 *
 * Pages that mark sections with `data-channel="stable|labs"` are cut from the
 * channel's marker to the next marker. A page without any marker is taken
 * whole; a page with markers but none for the channel yields null.
 */
export function extractChannelSection(html: string, channel: ReleaseChannel): string | null {
  const markers: Array<{ channel: string; index: number }> = [];
  const pattern = new RegExp(SECTION_MARKER.source, SECTION_MARKER.flags);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(html)) !== null) {
    markers.push({ channel: match[1].toLowerCase(), index: match.index });
  }

  if (markers.length === 0) return html;

  const position = markers.findIndex((marker) => marker.channel === channel);
  if (position === -1) return null;

  const end = position + 1 < markers.length ? markers[position + 1].index : html.length;
  return html.slice(markers[position].index, end);
}

/**
 * Find the newest release of a channel in a listing page.
 * Returns null when the channel has no parseable version entry.
 */
export function parseLatestRelease(
  html: string,
  channel: ReleaseChannel,
  baseUrl: string = DEFAULT_DOWNLOAD_URL,
): ReleaseInfo | null {
  const section = extractChannelSection(html, channel);
  if (section === null) return null;

  const versionMatch = VERSION_ENTRY.exec(section);
  if (!versionMatch) return null;

  const version = versionMatch[1];
  if (!isValidVersion(version)) {
    log.warn(`Ignoring malformed version entry "${version}" on the ${channel} listing`);
    return null;
  }

  const linkMatch = CLIENT_ARCHIVE_LINK.exec(section);
  const downloadUrl = linkMatch
    ? new URL(linkMatch[1].replace(/&amp;/g, "&"), `${listingUrl(channel, baseUrl)}/`).toString()
    : buildArchiveUrl(baseUrl, version, "client");

  return {
    channel,
    version,
    downloadUrl,
    serverDownloadUrl: buildArchiveUrl(baseUrl, version, "server"),
  };
}

/**
 * Fetch a listing page as text.
 * Times out after 10 seconds. Throws on non-ok responses or network errors.
 */
export async function fetchListingPage(url: string): Promise<string> {
  log.debug(`Fetching listing page ${url}`);

  const response = await fetch(url, {
    signal: AbortSignal.timeout(10_000),
  });

  if (!response.ok) {
    throw new Error(
      `Failed to fetch listing page: HTTP ${response.status} ${response.statusText}`,
    );
  }

  return response.text();
}

/**
 * Locate the newest release of a channel on the downloads site.
 * Every failure surfaces as a ReleaseNotFound InstallError.
 */
export async function fetchLatestRelease(
  channel: ReleaseChannel,
  options?: { baseUrl?: string },
): Promise<ReleaseInfo> {
  const baseUrl = options?.baseUrl ?? DEFAULT_DOWNLOAD_URL;
  const url = listingUrl(channel, baseUrl);

  let html: string;
  try {
    html = await fetchListingPage(url);
  } catch (err) {
    throw new InstallError(
      "ReleaseNotFound",
      `Unable to open downloads page ${url}: ${formatError(err)}`,
      { cause: err },
    );
  }

  const release = parseLatestRelease(html, channel, baseUrl);
  if (!release) {
    throw new InstallError(
      "ReleaseNotFound",
      `No ${channel} release found on ${url}`,
    );
  }

  log.info(`Latest ${channel} release: ${release.version}`);
  return release;
}

/** ReleaseSource backed by the public downloads listing pages. */
export class ListingPageReleaseSource implements ReleaseSource {
  constructor(private readonly baseUrl: string = DEFAULT_DOWNLOAD_URL) {}

  fetchLatestRelease(channel: ReleaseChannel): Promise<ReleaseInfo> {
    return fetchLatestRelease(channel, { baseUrl: this.baseUrl });
  }
}
