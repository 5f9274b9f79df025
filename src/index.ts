#!/usr/bin/env node

import { Command } from 'commander';
import { createServices } from './bootstrap.js';
import { type ActionCliServices, registerActionCommands } from './cli/actions.js';
import { createTerminalDecide } from './cli/prompt.js';
import { loadConfig } from './config/loader.js';
import { createLogger, initLogger } from './utils/logger.js';

const program = new Command();
const logger = createLogger('main');

async function resolveServices(configPath?: string): Promise<ActionCliServices> {
	const loaded = loadConfig(configPath);
	if (!loaded.ok) {
		throw loaded.error;
	}
	const config = loaded.value;

	initLogger({
		level: config.logging.level,
		filePath: config.logging.file,
	});
	logger.debug('Config loaded', { path: configPath ?? '(default)', mode: config.approval.mode });

	const services = createServices(config, {
		decide: config.approval.mode === 'interactive' ? createTerminalDecide() : undefined,
	});
	return { services };
}

program
	.name('capgate')
	.description('Capability-gated actions: policy, approval, sandboxed files and whitelisted commands')
	.version('0.1.0');

registerActionCommands(program, { resolveServices });

program.parse();
