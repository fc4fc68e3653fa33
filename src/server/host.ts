import { createAgentsFromConfig, AgentRegistry, type AgentCapability } from "../agents";
import { AuthTokenSet } from "../auth";
import { DEFAULT_HOST, DEFAULT_PORT, type RelayConfig } from "../config";
import {
  ConversationStore,
  ConversationSweeper,
  DEFAULT_CONVERSATION_MAX_AGE_HOURS,
  DEFAULT_SWEEP_INTERVAL_MS,
  hoursToMs,
} from "../conversations";
import { DispatchService } from "../dispatch";
import { configureLogger, logger } from "../logger";
import { RelayHttpServer } from "./http-server";

export interface RelayHostOptions {
  /** Replaces the agents built from config. */
  agents?: AgentCapability[];
  env?: Record<string, string | undefined>;
}

/** Owns every long-lived piece of a running relay. */
export class RelayHost {
  readonly registry = new AgentRegistry();
  readonly conversations: ConversationStore | undefined;
  readonly dispatch: DispatchService;
  readonly server: RelayHttpServer;
  private readonly sweeper: ConversationSweeper | undefined;
  private started = false;

  constructor(
    private readonly config: RelayConfig,
    options: RelayHostOptions = {},
  ) {
    configureLogger(config.logging?.level);

    const conversationsConfig = config.conversations;
    if (conversationsConfig?.enabled !== false) {
      this.conversations = new ConversationStore({
        maxAgeMs: hoursToMs(conversationsConfig?.maxAgeHours ?? DEFAULT_CONVERSATION_MAX_AGE_HOURS),
      });
      this.sweeper = new ConversationSweeper(this.conversations);
    }

    const agents =
      options.agents ??
      createAgentsFromConfig(config, { conversations: this.conversations, env: options.env });
    for (const agent of agents) {
      this.registry.register(agent);
    }

    this.dispatch = new DispatchService({
      registry: this.registry,
      bufferSize: config.server?.streamBufferSize,
    });
    this.server = new RelayHttpServer({
      host: config.server?.host ?? DEFAULT_HOST,
      port: config.server?.port ?? DEFAULT_PORT,
      dispatch: this.dispatch,
      conversations: this.conversations,
      tokens: new AuthTokenSet(config.auth?.tokens ?? []),
    });
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    this.sweeper?.start(this.config.conversations?.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    try {
      await this.server.start();
    } catch (error) {
      this.sweeper?.stop();
      this.started = false;
      throw error;
    }
    logger.info({ agents: this.registry.list() }, "Relay host started");
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.sweeper?.stop();
    await this.server.stop();
    logger.info("Relay host stopped");
  }
}
