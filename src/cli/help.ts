/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: llama-completion-mcp [options]

Serves a generate_completion MCP tool over streamable HTTP, backed by llama-cli.

Options:
  --config <file>      Env file with server and llama-cli settings (default: byte-vision-cfg.env)
  --port <port>        HTTP port, overrides HttpPort (default: 8080)
  --endpoint <path>    MCP endpoint path, overrides EndPoint (default: /mcp-completion)
  --debug              Log resolved arguments and subprocess lifecycle
  --json               Emit log lines as JSON
  -h, --help           Show this help message
  -v, --version        Show version number

Examples:
  llama-completion-mcp
  llama-completion-mcp --config ./models/byte-vision-cfg.env
  llama-completion-mcp --port 9090 --endpoint /mcp --debug`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}
