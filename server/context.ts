import type { AiSettings } from "./config";
import type { StorageGateway } from "./db";
import { AuthManager } from "./auth";
import { createSummarizer, type ConverseFn, type Summarizer } from "./ai";
import { IncidentService } from "./services/incidents";
import { DatasetService } from "./services/datasets";
import { TicketService } from "./services/tickets";

/**
 * Everything a request handler may touch. Built once at start-up and handed
 * to the routes; there is no module-level storage or current user.
 */
export interface AppContext {
  gateway: StorageGateway;
  auth: AuthManager;
  incidents: IncidentService;
  datasets: DatasetService;
  tickets: TicketService;
  summarizer: Summarizer;
}

export interface ContextOptions {
  clock?: () => Date;
  sessionTtlMs?: number;
  converse?: ConverseFn;
}

export function createContext(gateway: StorageGateway, ai: AiSettings, options: ContextOptions = {}): AppContext {
  return {
    gateway,
    auth: new AuthManager(gateway, { sessionTtlMs: options.sessionTtlMs, clock: options.clock }),
    incidents: new IncidentService(gateway, options.clock),
    datasets: new DatasetService(gateway, options.clock),
    tickets: new TicketService(gateway, options.clock),
    summarizer: createSummarizer(ai, options.converse),
  };
}
