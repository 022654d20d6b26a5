import { env, type Env } from '@autodj/config';
import { logger } from '@autodj/logger';
import {
  AutoDjController,
  autoDjSettingsFromEnv,
  CatalogTrackResolver,
  createChatClient,
  DisabledScrobbler,
  DjMetrics,
  GptRecommendationEngine,
  HistoryLog,
  JsonlHistoryStore,
  LastFmScrobbler,
  loadPromptTemplates,
  LrclibLyricsAdapter,
  MysteryCrate,
  OpenAiCompletionBackend,
  SpotifyPlaybackAdapter,
  TrackQueuer,
  UpNext,
  type ScrobbleAdapter,
} from '@autodj/dj';
import { KeypressCommandSource, type KeyInput } from './input/command-source.js';
import { SessionOrchestrator } from './session/orchestrator.js';
import { TerminalStatusView } from './ui/status-view.js';

export interface ApplicationIo {
  input: KeyInput;
  output: NodeJS.WritableStream;
}

function createScrobbler(config: Env): ScrobbleAdapter {
  const { LASTFM_API_KEY, LASTFM_API_SECRET, LASTFM_SESSION_KEY } = config;
  if (LASTFM_API_KEY && LASTFM_API_SECRET && LASTFM_SESSION_KEY) {
    return new LastFmScrobbler({ apiKey: LASTFM_API_KEY, apiSecret: LASTFM_API_SECRET, sessionKey: LASTFM_SESSION_KEY });
  }
  logger.info('Last.fm credentials not set, scrobbling disabled');
  return new DisabledScrobbler();
}

/**
 * Composition Root
 * Wires the Auto-DJ core to the remote services and the terminal.
 */
export class DjApplication {
  private session: SessionOrchestrator | null = null;

  constructor(
    private readonly config: Env = env,
    private readonly io: ApplicationIo = { input: process.stdin, output: process.stdout },
  ) {}

  async initialize(): Promise<SessionOrchestrator> {
    const config = this.config;
    const templates = loadPromptTemplates(config.PROMPTS_FILE);
    const history = await HistoryLog.open(new JsonlHistoryStore(config.HISTORY_FILE));
    const metrics = new DjMetrics();
    const upNext = new UpNext();

    const playback = new SpotifyPlaybackAdapter({
      clientId: config.SPOTIFY_CLIENT_ID,
      clientSecret: config.SPOTIFY_CLIENT_SECRET,
      refreshToken: config.SPOTIFY_REFRESH_TOKEN,
    });

    const client = createChatClient(
      config.USE_LOCAL_LLM
        ? { apiKey: config.OPENAI_API_KEY, baseURL: config.LOCAL_LLM_URL }
        : { apiKey: config.OPENAI_API_KEY },
    );
    const assistant = new OpenAiCompletionBackend(client, {
      model: config.GPT_MODEL,
      templates,
      systemPrompt: config.SYSTEM_PROMPT,
      onResponse: ({ key, response }) => {
        logger.debug({ key, response }, 'Model response');
      },
    });
    const resolver = new CatalogTrackResolver(playback);
    const settings = autoDjSettingsFromEnv(config);
    const queuer = new TrackQueuer({ resolver, history, playback, upNext }, settings.repeatWindow);

    const controller = new AutoDjController(
      {
        engine: new GptRecommendationEngine(assistant),
        resolver,
        history,
        playback,
        upNext,
        currentTrack: () => this.session?.state.playback?.track ?? null,
        metrics,
      },
      settings,
    );

    const commands = new KeypressCommandSource(this.io.input).start();
    this.session = new SessionOrchestrator(
      {
        commands,
        playback,
        controller,
        history,
        upNext,
        queuer,
        mystery: new MysteryCrate({ assistant, resolver, queuer }),
        engine: new GptRecommendationEngine(assistant, 'recommend_next_song'),
        assistant,
        lyrics: new LrclibLyricsAdapter(),
        scrobbler: createScrobbler(config),
        metrics,
        view: new TerminalStatusView(this.io.output),
      },
      {
        queueTarget: config.AUTODJ_QUEUE_TARGET,
        intervalMs: config.AUTODJ_INTERVAL_MS,
        pollIntervalMs: config.POLL_INTERVAL_MS,
        tickMs: config.TICK_MS,
        repeatWindow: config.AUTODJ_REPEAT_WINDOW,
      },
    );

    logger.info(
      { historyFile: config.HISTORY_FILE, seeded: history.size, model: config.GPT_MODEL, localLlm: config.USE_LOCAL_LLM },
      'Auto-DJ console initialized',
    );
    return this.session;
  }

  async run(): Promise<void> {
    const session = this.session ?? (await this.initialize());
    await session.run();
  }

  async shutdown(): Promise<void> {
    await this.session?.shutdown();
  }
}
