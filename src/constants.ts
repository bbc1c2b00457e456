export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'talknotes';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;
export const DEFAULT_SKIP_SUMMARY = false;
export const DEFAULT_OUTPUT_DIRECTORY = './notes';
export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';

export const DEFAULT_AUDIO_EXTENSIONS = ['mp3', 'mp4', 'mpeg', 'mpga', 'm4a', 'wav', 'webm'];
export const DEFAULT_IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'webp'];

// Models are not validated against an allowlist; any model the endpoint serves works.
export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';
export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_VISION_MODEL = 'gpt-4o-mini';

export const DEFAULT_REQUEST_TIMEOUT_MS = 120000;
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 4;
export const DEFAULT_IMAGE_CONCURRENCY = 2;
export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_MAX_TOKENS = 4096;

export const DEFAULT_UNDERSTANDING_LEVEL = 3;
export const MIN_UNDERSTANDING_LEVEL = 0;
export const MAX_UNDERSTANDING_LEVEL = 5;

// Below this lexical overlap an image is left unplaced rather than forced into a section.
export const DEFAULT_MIN_PLACEMENT_SCORE = 0.15;
export const DEFAULT_MAX_WINDOW_CHARS = 24000;

export const MAX_OCR_PROMPT_CHARS = 3000;
export const SKIP_SUMMARY_OVERVIEW_CHARS = 500;
export const UNTITLED = 'Untitled Session';

export const IMAGE_CATEGORIES = ['slide', 'diagram', 'photo', 'chart', 'screenshot', 'unknown'] as const;

export const TALKNOTES_DEFAULTS = {
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    model: DEFAULT_MODEL,
    visionModel: DEFAULT_VISION_MODEL,
    transcriptionModel: DEFAULT_TRANSCRIPTION_MODEL,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    maxConcurrentRequests: DEFAULT_MAX_CONCURRENT_REQUESTS,
    imageConcurrency: DEFAULT_IMAGE_CONCURRENCY,
    minPlacementScore: DEFAULT_MIN_PLACEMENT_SCORE,
    maxWindowChars: DEFAULT_MAX_WINDOW_CHARS,
    temperature: DEFAULT_TEMPERATURE,
    maxTokens: DEFAULT_MAX_TOKENS,
    skipSummary: DEFAULT_SKIP_SUMMARY,
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    configDirectory: DEFAULT_CONFIG_DIR,
};
