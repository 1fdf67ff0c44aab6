import chalk from 'chalk';

export function showHelp(): void {
  console.log(`
${chalk.bold('md2cf - Publish Markdown documents to Confluence')}

${chalk.yellow('Usage:')}
  md2cf [options] [paths...]

${chalk.yellow('Description:')}
  Publishes every Markdown file whose front-matter sets wiki.share: true.
  Each document becomes a page titled by its front-matter title (or file name),
  created under its ancestor on first publish and updated afterwards.

  Paths may be files or directories (searched recursively for .md files).
  Without paths, the files added or modified by the last commit of the
  git repository given by --git (default: current directory) are published.

${chalk.yellow('Options:')}
  --api_url <url>           Confluence REST root, e.g. https://wiki.example.com/rest/api
  --username <user>         User for basic auth (bearer token auth when omitted)
  --password <secret>       Password or API token
  --space <key>             Space key to publish into
  --ancestor_id <id>        Default parent page id
  --global_label <label>    Label added to every published page
  --header <NAME=VALUE>     Extra request header, NAME: VALUE also works (repeatable)
  --git <path>              Repository to read the last commit from
  --dry-run                 Print mutating requests instead of sending them
  --xml                     Output the run summary as XML
  --verbose                 Log requests to stderr
  --help, -h                Show help message
  --version, -v             Show version number

${chalk.yellow('Environment Variables:')}
  CONFLUENCE_API_URL        Fallback for --api_url
  CONFLUENCE_USERNAME       Fallback for --username
  CONFLUENCE_PASSWORD       Fallback for --password
  CONFLUENCE_SPACE          Fallback for --space
  CONFLUENCE_ANCESTOR_ID    Fallback for --ancestor_id
  CONFLUENCE_GLOBAL_LABEL   Fallback for --global_label
  CONFLUENCE_HEADER_<NAME>  Extra request header NAME
  MD2CF_DEBUG               Enable debug logging
  NO_COLOR                  Disable colored output

${chalk.yellow('Front-matter:')}
  ---
  title: Getting Started
  tags: [guide]
  authors: [jdoe]
  wiki:
    share: true
    ancestor_id: 123456
    labels: [onboarding]
  ---

${chalk.yellow('Examples:')}
  md2cf docs/                        Publish shared documents under docs/
  md2cf README.md --dry-run          Show what would be sent
  md2cf --git ../handbook            Publish documents changed by the last commit
`);
}
