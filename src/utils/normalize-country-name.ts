/**
 * Centralized country name normalizer.
 * Single source of truth for country labels coming out of the geocoder
 * and for cached values written before normalization existed.
 *
 * Folds common variations onto one canonical name:
 * - "USA", "US", "United States of America" -> "United States"
 * - "UK", "England", "Great Britain" -> "United Kingdom"
 * - Native spellings: "Deutschland" -> "Germany", "Holland" -> "Netherlands"
 */

const COUNTRY_ALIASES: Record<string, string> = {
  // United States variations
  usa: "United States",
  us: "United States",
  "u.s.": "United States",
  "u.s.a.": "United States",
  "united states of america": "United States",

  // United Kingdom variations
  uk: "United Kingdom",
  "u.k.": "United Kingdom",
  britain: "United Kingdom",
  "great britain": "United Kingdom",
  england: "United Kingdom",
  scotland: "United Kingdom",
  wales: "United Kingdom",
  "northern ireland": "United Kingdom",
  "united kingdom of great britain and northern ireland": "United Kingdom",

  // Native spellings
  deutschland: "Germany",
  nederland: "Netherlands",
  holland: "Netherlands",
  "the netherlands": "Netherlands",
  españa: "Spain",
  espana: "Spain",
  italia: "Italy",
  schweiz: "Switzerland",
  suisse: "Switzerland",
  svizzera: "Switzerland",
  österreich: "Austria",
  osterreich: "Austria",
  czechia: "Czech Republic",
  "republic of korea": "South Korea",
  uae: "United Arab Emirates",
};

/**
 * Normalize a country name for tallies and cache values.
 * Unrecognized names pass through trimmed; blank names become "Unknown".
 *
 * @example
 * normalizeCountryName("USA")         // "United States"
 * normalizeCountryName("deutschland") // "Germany"
 * normalizeCountryName("France")      // "France"
 */
export function normalizeCountryName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) return "Unknown";

  return COUNTRY_ALIASES[trimmed.toLowerCase()] ?? trimmed;
}
