// Interview Signal Engine - Entry point
// Wires up all pipeline dependencies from the environment and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { AssessmentPipeline } from "./assessment-pipeline.js";
import { InMemoryAssessmentRepository } from "./assessment-repository.js";
import { createWavRecorderFactory } from "./audio-recorder.js";
import { loadConfig, type AppConfig } from "./config.js";
import {
  LexicalEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type EmbeddingProvider,
  type OpenAIEmbeddingClient,
} from "./embedding-similarity.js";
import {
  AcousticVoiceDetector,
  DisabledEmotionDetector,
  HttpEmotionDetector,
  type EmotionDetector,
} from "./emotion-detectors.js";
import { FileEmotionLogSink } from "./emotion-log-sink.js";
import { errorMessage } from "./errors.js";
import { SemanticEvidenceExtractor } from "./evidence-extractor.js";
import { createConsoleLogger } from "./logger.js";
import { ScoringWeightsHolder } from "./score-combiner.js";
import { SentimentAnalyzer } from "./sentiment-analyzer.js";
import { createAppServer } from "./server.js";
import { SessionController } from "./session-controller.js";
import {
  DeepgramTranscriber,
  OpenAITranscriber,
  type DeepgramPrerecordedClient,
  type OpenAITranscriptionClient,
  type Transcriber,
} from "./transcription-engine.js";

export const APP_NAME = "Interview Signal Engine";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(`Invalid configuration: ${errorMessage(err)}. Check your .env file.`);
  process.exit(1);
}

logInit(`Configuration loaded (transcription: ${config.transcriptionProvider})`);

// ─── Initialize API clients ─────────────────────────────────────────────────────

const openaiClient = config.openaiApiKey ? new OpenAI({ apiKey: config.openaiApiKey }) : null;

function createTranscriber(): Transcriber {
  const logger = createConsoleLogger("TranscriptionEngine");
  if (config.transcriptionProvider === "deepgram" && config.deepgramApiKey) {
    logInit("Creating Deepgram client (prerecorded, diarized)...");
    const deepgramClient = createDeepgramClient(config.deepgramApiKey);
    return new DeepgramTranscriber(deepgramClient as unknown as DeepgramPrerecordedClient, {
      language: config.transcriptLanguage,
      candidateSpeakerIndex: config.candidateSpeakerIndex,
      logger,
    });
  }
  if (!openaiClient) {
    logFatal("OPENAI_API_KEY is not set. Add it to your .env file.");
    process.exit(1);
  }
  logInit(`Using OpenAI transcription (${config.openaiTranscribeModel})...`);
  return new OpenAITranscriber(openaiClient as unknown as OpenAITranscriptionClient, {
    model: config.openaiTranscribeModel,
    language: config.transcriptLanguage,
    logger,
  });
}

function createEmbeddingProvider(): EmbeddingProvider {
  if (openaiClient) {
    logInit(`Using OpenAI embeddings (${config.openaiEmbeddingModel})...`);
    return new OpenAIEmbeddingProvider(openaiClient as unknown as OpenAIEmbeddingClient, config.openaiEmbeddingModel);
  }
  logInit("OPENAI_API_KEY not set: using lexical embeddings for evidence ranking");
  return new LexicalEmbeddingProvider();
}

function createDetectors(): { facial: EmotionDetector; voice: EmotionDetector } {
  if (config.emotionServiceUrl) {
    logInit(`Using emotion model service at ${config.emotionServiceUrl}`);
    return {
      facial: new HttpEmotionDetector("facial", { baseUrl: config.emotionServiceUrl }),
      voice: new HttpEmotionDetector("voice", {
        baseUrl: config.emotionServiceUrl,
        sampleRate: config.ingress.audioSampleRate,
      }),
    };
  }
  logInit("EMOTION_SERVICE_URL not set: facial detection disabled, acoustic voice heuristic enabled");
  return {
    facial: new DisabledEmotionDetector("facial"),
    voice: new AcousticVoiceDetector({ sampleRate: config.ingress.audioSampleRate }),
  };
}

// ─── Initialize pipeline components ─────────────────────────────────────────────

const detectors = createDetectors();

logInit(`Wiring SessionController (recordings: ${config.recordingsDir}, emotion logs: ${config.emotionLogDir})...`);
const controller = new SessionController({
  facialDetector: detectors.facial,
  voiceDetector: detectors.voice,
  recorderFactory: createWavRecorderFactory(config.recordingsDir, config.ingress.audioSampleRate),
  emotionLogSink: new FileEmotionLogSink(config.emotionLogDir),
  config: config.session,
  aggregatorConfig: config.aggregator,
  ingressConfig: config.ingress,
});

logInit(`Wiring AssessmentPipeline (weights ${config.weights.aiWeight}/${config.weights.manualWeight})...`);
const weights = new ScoringWeightsHolder(config.weights);
const embeddingProvider = createEmbeddingProvider();
const pipeline = new AssessmentPipeline({
  transcriber: createTranscriber(),
  extractor: new SemanticEvidenceExtractor(embeddingProvider),
  repository: new InMemoryAssessmentRepository(),
  weights,
  sentiment: new SentimentAnalyzer(embeddingProvider),
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ controller, pipeline, weights });

const shutdown = (signal: string) => {
  logInit(`${signal} received, closing sessions...`);
  server.close().then(
    () => process.exit(0),
    (err) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

server.listen(config.port).then(
  (port) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logInit("Live: frames → detectors → aggregator → emotion_update; Batch: WAV → transcript → evidence → scores");
    logInit("Ready for connections");
  },
  (err) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  },
);
