/**
 * Source adapter registry.
 * The set of archives is fixed; adding one means adding it here.
 */

import type { LiteratureSearch } from "../citations/europepmc.js";
import type { CitationResolver } from "../citations/pubmed.js";
import type { ServiceClient } from "../http/client.js";
import type { Logger } from "../logger.js";
import type { SourceAdapter } from "../types.js";
import { createEnaAdapter } from "./ena.js";
import { createGeoAdapter } from "./geo.js";

export interface SourceClients {
  /** NCBI E-utilities */
  eutils: ServiceClient;
  /** NCBI GEO FTP-over-HTTPS */
  ftp: ServiceClient;
  /** EBI services (ENA, Europe PMC) */
  ebi: ServiceClient;
}

export interface SourceDeps {
  clients: SourceClients;
  citations: CitationResolver;
  literature: LiteratureSearch;
  logger: Logger;
  downloadTimeoutMs?: number;
}

/** Instantiate every known adapter. */
export function createSourceAdapters(deps: SourceDeps): SourceAdapter[] {
  const geo = createGeoAdapter({
    eutils: deps.clients.eutils,
    ftp: deps.clients.ftp,
    citations: deps.citations,
    literature: deps.literature,
    logger: deps.logger,
    ...(deps.downloadTimeoutMs !== undefined ? { downloadTimeoutMs: deps.downloadTimeoutMs } : {}),
  });
  const ena = createEnaAdapter({
    ebi: deps.clients.ebi,
    citations: deps.citations,
    literature: deps.literature,
    logger: deps.logger,
  });
  return [geo, ena];
}

export { createEnaAdapter } from "./ena.js";
export { createGeoAdapter } from "./geo.js";
