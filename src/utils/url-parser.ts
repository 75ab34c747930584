import { GREENHOUSE_EMBED_URL, GREENHOUSE_HOSTS } from '../types';

export interface ParsedUrl {
  url: string;
  isValid: boolean;
  isGreenhouse: boolean;
  error?: string;
}

export function parseJobUrl(url: string): ParsedUrl {
  // Validate URL format
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    return { url, isValid: false, isGreenhouse: false, error: 'Invalid URL format' };
  }

  if (!['http:', 'https:'].includes(parsedUrl.protocol)) {
    return { url, isValid: false, isGreenhouse: false, error: 'URL must use HTTP or HTTPS protocol' };
  }

  return {
    url,
    isValid: true,
    isGreenhouse: GREENHOUSE_HOSTS.test(parsedUrl.hostname),
  };
}

/**
 * Company career pages embed the Greenhouse form and carry the job id in
 * `gh_jid`. The embed URL with only the token loads the form directly.
 */
export function resolveGreenhouseUrl(url: string): string {
  const parsed = parseJobUrl(url);
  if (!parsed.isValid || parsed.isGreenhouse) return url;

  const ghJid = new URL(url).searchParams.get('gh_jid');
  if (ghJid) {
    return `${GREENHOUSE_EMBED_URL}?token=${encodeURIComponent(ghJid)}`;
  }
  return url;
}
