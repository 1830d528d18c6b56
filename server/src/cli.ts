#!/usr/bin/env node
import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { loadServerConfig } from './config/server.config';
import { CircleArtError } from './errors/circle-art.errors';
import { CircleArtConfig } from './models/circle-art.interface';
import { createCircleArtService } from './services/circle-art.service';
import { formatRgb } from './services/color.service';
import {
  CircleArtConfigInput,
  createConfig,
  renderModeSchema,
  samplingModeSchema
} from './services/config.service';
import { WorkerManagerService } from './services/worker-manager.service';

export const USAGE = `Usage: circle-poster <input> <output> [options]

Options:
  -d, --circle-diameter <px>   Circle diameter in pixels (default 10)
  -s, --circle-spacing <px>    Spacing between circles in pixels (default 2)
  -w, --width-mm <mm>          Output width in millimeters
  -h, --height-mm <mm>         Output height in millimeters
  -b, --background <color>     Background color (e.g. #FFFFFF or white)
  -m, --mode <mode>            Sampling mode: grid, hexagonal, hex (default grid)
  -r, --render <mode>          Render mode: color, halftone-black, halftone-white
      --min-dot <px>           Smallest halftone dot radius
      --max-dot <px>           Largest halftone dot radius
      --workers <n>            Worker threads (default: CPU cores)
      --help                   Show this message`;

export interface CliOptions {
  inputPath: string;
  outputPath: string;
  config: CircleArtConfigInput;
  workerCount?: number;
}

export type CliCommand = { kind: 'help' } | ({ kind: 'render' } & CliOptions);

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`Invalid number for --${flag}: "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'circle-diameter': { type: 'string', short: 'd' },
      'circle-spacing': { type: 'string', short: 's' },
      'width-mm': { type: 'string', short: 'w' },
      'height-mm': { type: 'string', short: 'h' },
      background: { type: 'string', short: 'b' },
      mode: { type: 'string', short: 'm' },
      render: { type: 'string', short: 'r' },
      'min-dot': { type: 'string' },
      'max-dot': { type: 'string' },
      workers: { type: 'string' },
      help: { type: 'boolean' }
    }
  });

  if (values.help) {
    return { kind: 'help' };
  }

  if (positionals.length !== 2) {
    throw new Error('Expected an input image path and an output SVG path');
  }

  const samplingMode = samplingModeSchema.safeParse(values.mode ?? 'grid');
  if (!samplingMode.success) {
    throw new Error(`Unknown sampling mode "${values.mode}" (grid, hexagonal, hex)`);
  }
  const renderMode = renderModeSchema.safeParse(values.render ?? 'color');
  if (!renderMode.success) {
    throw new Error(`Unknown render mode "${values.render}" (color, halftone-black, halftone-white)`);
  }

  const workerCount = toNumber('workers', values.workers);
  if (workerCount !== undefined && (!Number.isInteger(workerCount) || workerCount < 1)) {
    throw new Error(`--workers must be a positive integer, got "${values.workers}"`);
  }

  return {
    kind: 'render',
    inputPath: positionals[0],
    outputPath: positionals[1],
    workerCount,
    config: {
      circleDiameter: toNumber('circle-diameter', values['circle-diameter']),
      circleSpacing: toNumber('circle-spacing', values['circle-spacing']),
      outputWidthMm: toNumber('width-mm', values['width-mm']),
      outputHeightMm: toNumber('height-mm', values['height-mm']),
      backgroundColor: values.background,
      samplingMode: samplingMode.data,
      renderMode: renderMode.data,
      minDotSize: toNumber('min-dot', values['min-dot']),
      maxDotSize: toNumber('max-dot', values['max-dot'])
    }
  };
}

export function describeConfig(config: CircleArtConfig): string[] {
  const lines = [
    'Configuration:',
    `  Circle diameter: ${config.circleDiameter} pixels`,
    `  Circle spacing: ${config.circleSpacing} pixels`,
    `  Sample mode: ${config.samplingMode}`,
    `  Render mode: ${config.renderMode}`
  ];
  if (config.dotSize) {
    lines.push(`  Dot radius: ${config.dotSize.min}-${config.dotSize.max} pixels`);
  }
  if (config.outputSize) {
    lines.push(`  Output dimensions: ${config.outputSize.widthMm}mm x ${config.outputSize.heightMm}mm`);
  }
  if (config.background) {
    lines.push(`  Background: ${formatRgb(config.background)}`);
  }
  return lines;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  let workerManager: WorkerManagerService | undefined;
  try {
    if (!existsSync(command.inputPath)) {
      throw new Error(`Input file does not exist: ${command.inputPath}`);
    }

    const config = createConfig(command.config);
    const serverConfig = loadServerConfig();
    const workerCount = command.workerCount ?? serverConfig.workerCount;
    workerManager = new WorkerManagerService(workerCount);
    const service = createCircleArtService(workerManager, {
      workerCount,
      parallelThreshold: serverConfig.parallelThreshold,
      progressInterval: serverConfig.progressInterval
    });

    console.log(`Processing image: ${command.inputPath}`);
    describeConfig(config).forEach(line => console.log(line));

    const input = await readFile(command.inputPath);
    const result = await service.renderBuffer(input, config);
    await writeFile(command.outputPath, result.svg, 'utf8');

    console.log(`Successfully generated SVG: ${command.outputPath} (${result.stats.circles} circles)`);
    console.log('Ready for printing!');
    return 0;
  } catch (error) {
    if (error instanceof CircleArtError) {
      console.error(`Error [${error.code}]: ${error.message}`);
    } else {
      console.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  } finally {
    workerManager?.terminateAll();
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
