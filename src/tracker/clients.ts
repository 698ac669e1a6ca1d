import type { Config } from '../types/index.js';
import { clientOptionsFromConfig } from '../sources/base-client.js';
import { CongressClient } from '../sources/congress.js';
import { FederalRegisterClient } from '../sources/federal-register.js';
import { CommitteeRssClient } from '../sources/committee-rss.js';
import { CommitteeMeetingClient } from '../sources/committee-meetings.js';
import { OpenFemaClient } from '../sources/openfema.js';
import { WatchlistClient } from '../sources/watchlist.js';
import { EmailClient } from '../notifications/email.js';
import { SnapshotStore } from '../state/index.js';

export interface TrackerClients {
  store: SnapshotStore;
  congress: CongressClient;
  federalRegister: FederalRegisterClient;
  committeeRss: CommitteeRssClient;
  committeeMeetings: CommitteeMeetingClient;
  openFema: OpenFemaClient;
  watchlist: WatchlistClient;
  email: EmailClient;
}

/**
 * Build every client from the environment config.
 * Throws when CONGRESS_API_KEY is missing.
 */
export function createTrackerClients(config: Config): TrackerClients {
  const http = clientOptionsFromConfig(config.http);
  const congressOptions = { ...http, apiKey: config.congress.apiKey, apiBase: config.congress.apiBase };
  const congress = new CongressClient(congressOptions);

  return {
    store: new SnapshotStore(config.paths.state),
    congress,
    federalRegister: new FederalRegisterClient({ ...http, apiBase: config.federalRegister.apiBase }),
    committeeRss: new CommitteeRssClient(http),
    committeeMeetings: new CommitteeMeetingClient(congressOptions),
    openFema: new OpenFemaClient({ ...http, apiBase: config.openFema.apiBase }),
    watchlist: new WatchlistClient(config.paths.watchlist, congress),
    email: new EmailClient({ apiKey: config.sendgrid.apiKey, timeoutMs: config.http.timeoutMs }),
  };
}
