/**
 * Identifies a hub variant. Discovery matches categories by `name`; standalone
 * placement (`preForHub`/`postForHub`) matches by identity.
 */
export interface HubCategory {
  readonly name: string;
  readonly title?: string;
}

export function defineHub(name: string, title?: string): HubCategory {
  return Object.freeze(title === undefined ? { name } : { name, title });
}

/** The pre-install dashboard: every screen the user may configure. */
export const SummaryHub = defineHub("SummaryHub", "Installation Summary");

/** Shown while packages are installed; hosts personalization screens. */
export const ProgressHub = defineHub("ProgressHub", "Installation Progress");
