import { ConfigurationError, type ConfigField, type RawConfig } from './Configuration.js';

export interface CommandLine {
  values: RawConfig;
  help: boolean;
  version: boolean;
  list: boolean;
}

const VALUE_FLAGS: Record<string, ConfigField> = {
  '-p': 'port',
  '--port': 'port',
  '-t': 'template',
  '--template': 'template',
  '-s': 'smbServer',
  '--smb': 'smbServer',
  '-r': 'realm',
  '--realm': 'realm',
  '-u': 'redirectUrl',
  '--url': 'redirectUrl',
  '-interface': 'interface',
  '--interface': 'interface',
};

const SWITCH_FLAGS: Record<string, ConfigField> = {
  '-a': 'analyzeOnly',
  '--analyze': 'analyzeOnly',
  '-b': 'basicAuth',
  '--basic': 'basicAuth',
};

/**
 * Flags may appear before or after the positional interface name.
 */
export function parseCommandLine(args: readonly string[]): CommandLine {
  const parsed: CommandLine = {
    values: {},
    help: false,
    version: false,
    list: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      parsed.help = true;
      continue;
    }
    if (arg === '-version' || arg === '--version') {
      parsed.version = true;
      continue;
    }
    if (arg === '-l' || arg === '--list') {
      parsed.list = true;
      continue;
    }

    const switchField = SWITCH_FLAGS[arg];
    if (switchField) {
      parsed.values[switchField] = true;
      continue;
    }

    const valueField = VALUE_FLAGS[arg];
    if (valueField) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new ConfigurationError(`flag ${arg} requires a value`, valueField);
      }
      parsed.values[valueField] = value;
      i++;
      continue;
    }

    if (!arg.startsWith('-') && parsed.values.interface === undefined) {
      parsed.values.interface = arg;
      continue;
    }

    throw new ConfigurationError(`unknown flag: ${arg}`);
  }

  return parsed;
}

export const USAGE = `usage: lanlure [-h] [-p PORT] [-t TEMPLATE] [-s SMB] [-b] [-r REALM]
               [-u URL] [-a] [-l] [--version]
               interface

positional arguments:
  interface             Network interface to listen on.

optional arguments:
  -h, --help            show this help message and exit
  -p PORT, --port PORT  Port for HTTP server. Defaults to 8888.
  -t TEMPLATE, --template TEMPLATE
                        Name of a folder in the templates directory. Defaults
                        to "office365". This will determine xml and phishing
                        pages used.
  -s SMB, --smb SMB     IP address of your SMB server. Defaults to the primary
                        address of the "interface" provided.
  -b, --basic           Enable base64 authentication for templates and write
                        credentials to log file.
  -r REALM, --realm REALM
                        Realm when prompting target for authentication via
                        Basic Auth.
  -u URL, --url URL     Redirect to this URL. Works with templates that do a
                        POST for logon forms and with templates that include
                        the custom redirect JavaScript.
  -a, --analyze         Run in analyze mode. Will NOT respond to any SSDP
                        queries, but will still enable and run the web server
                        for testing.
  -l, --list            List the available templates and exit.
  --version             Print the version and exit.
`;
