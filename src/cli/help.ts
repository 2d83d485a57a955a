/**
 * @fileoverview Detailed help text for wayfarer CLI commands
 */

const HELP_TEXT = {
  main: `
Wayfarer - Vietnam travel assistant over a vector index and a knowledge graph

USAGE:
    wayfarer [command] [options]

COMMANDS:
    chat                Start the interactive travel chat (default)
    search "<query>"    Show similar places and related places, without the model
    check               Report vector index and graph database health
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -c, --config <path> Read configuration from this YAML file (default: ./wayfarer.yaml)
    --verbose           Log retrieval steps and timings to stderr

ENVIRONMENT:
    OPENROUTER_API_KEY  Key for the chat completion endpoint
    OPENAI_API_KEY      Key for the embedding endpoint
    PINECONE_API_KEY    Key for the vector index
    NEO4J_URI, NEO4J_USER, NEO4J_PASSWORD
                        Graph database connection
    WAYFARER_LOG_LEVEL  debug | info | warn | error | silent (default: info)

EXAMPLES:
    wayfarer
    wayfarer chat --async
    wayfarer search "quiet beaches near Da Nang" --top-k 5
    wayfarer check --json

For more information on a specific command, run:
    wayfarer help <command>
`,

  chat: `
wayfarer chat - Start the interactive travel chat

USAGE:
    wayfarer chat [--async]

OPTIONS:
    --async             Start each vector search from a fresh event-loop turn

DESCRIPTION:
    Reads one question per line. For each question the assistant searches the
    vector index, expands the top matches through the knowledge graph, prints
    a one-line summary of the evidence and then the model's answer.

    Type quit, exit or q (any case) to leave. Ctrl+C also ends the session.
    Embeddings are cached for the lifetime of the session.

EXAMPLES:
    wayfarer chat
    wayfarer chat --async
`,

  search: `
wayfarer search - Show similar places and related places, without the model

USAGE:
    wayfarer search "<query>" [options]

OPTIONS:
    --top-k <n>         Number of similar places to show (default: 3)

DESCRIPTION:
    Embeds the query, lists the nearest places from the vector index with
    their similarity, then lists up to 10 graph neighbours of the top match.

EXAMPLES:
    wayfarer search "cultural heritage and temples"
    wayfarer search "mountain trekking" --top-k 5
`,

  check: `
wayfarer check - Report vector index and graph database health

USAGE:
    wayfarer check [--json]

OPTIONS:
    --json              Print the report as JSON

DESCRIPTION:
    Vector index: name, record count, dimension, per-namespace counts and a
    probe query. Graph: node and relationship totals, counts per label and
    per relationship type.

    Exit code is non-zero when either store could not be reached.

EXAMPLES:
    wayfarer check
    wayfarer check --json
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
