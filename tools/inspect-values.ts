#!/usr/bin/env node

/**
 * CLI tool printing encoded generic value trees
 * 打印已编码通用值树的CLI工具
 *
 * Decodes `.msgpack` and `.json` files and renders them as indented trees or as JSON.
 * 解码`.msgpack`与`.json`文件，并以缩进树或JSON形式输出。
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { Command } from 'commander';
import chalk from 'chalk';
import { glob, hasMagic } from 'glob';
import { JsonCodec } from '../src/codec/JsonCodec';
import { MessagePackCodec } from '../src/codec/MessagePackCodec';
import { formatValue } from '../src/debug/ValueFormatter';
import type { GenericValue } from '../src/value/GenericValue';

/**
 * CLI configuration
 * CLI配置
 */
export interface InspectConfig {
  input: string[];
  json: boolean;
  indent: number;
}

/**
 * Inspection result of one file
 * 单个文件的检查结果
 */
export interface InspectionResult {
  filePath: string;
  success: boolean;
  output?: string;
  error?: string;
}

/**
 * Decode a file by its extension
 * 按扩展名解码文件
 */
export async function decodeFile(filePath: string): Promise<GenericValue> {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.msgpack':
    case '.mpk':
      return new MessagePackCodec().decode(new Uint8Array(await fs.promises.readFile(filePath)));
    case '.json':
      return new JsonCodec().decode(await fs.promises.readFile(filePath, 'utf-8'));
    default:
      throw new Error(`Unsupported file extension "${extension}" (expected .msgpack, .mpk or .json)`);
  }
}

/**
 * Render one file according to the configuration
 * 按配置渲染单个文件
 */
export async function inspectFile(filePath: string, config: InspectConfig): Promise<InspectionResult> {
  try {
    const value = await decodeFile(filePath);
    const output = config.json
      ? new JsonCodec(true).encode(value)
      : formatValue(value, ' '.repeat(config.indent));
    return { filePath, success: true, output };
  } catch (error) {
    return {
      filePath,
      success: false,
      error: error instanceof Error ? error.message : String(error)
    };
  }
}

/**
 * Expand glob patterns into a sorted list of absolute file paths
 * 将glob模式展开为排序后的绝对路径列表
 */
export async function expandInputs(patterns: string[]): Promise<string[]> {
  const files = new Set<string>();
  for (const pattern of patterns) {
    if (hasMagic(pattern)) {
      for (const match of await glob(pattern, { absolute: true, nodir: true })) {
        files.add(match);
      }
    } else {
      files.add(path.resolve(pattern));
    }
  }
  return Array.from(files).sort();
}

async function run(config: InspectConfig): Promise<number> {
  const files = await expandInputs(config.input);
  if (files.length === 0) {
    console.log(chalk.yellow('⚠️  No input files found'));
    return 1;
  }

  let failed = 0;
  for (const file of files) {
    const result = await inspectFile(file, config);
    console.log(chalk.blue(`📖 ${path.relative(process.cwd(), file)}`));
    if (result.success) {
      console.log(result.output);
    } else {
      failed++;
      console.log(chalk.red(`   └── ${result.error}`));
    }
    console.log('');
  }

  console.log(chalk.gray(`${files.length - failed} decoded, ${failed} failed`));
  return failed > 0 ? 1 : 0;
}

/**
 * Main program entry point
 * 主程序入口点
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name('treepack-inspect')
    .description('Print generic value trees stored as MessagePack or JSON')
    .version('1.0.0')
    .argument('<input...>', 'Input files (supports glob patterns)')
    .option('--json', 'Print as JSON instead of a tree')
    .option('--indent <size>', 'Indentation size for trees', '2')
    .action(async (input: string[], options: { json?: boolean; indent: string }) => {
      const indent = Number.parseInt(options.indent, 10);
      exitCode = await run({
        input,
        json: options.json === true,
        indent: Number.isNaN(indent) ? 2 : indent
      });
    });

  program.addHelpText('after', `
Examples:
  npm run inspect -- save.msgpack                 # Print one file
  npm run inspect -- "fixtures/**/*.json" --json  # Print many files as JSON
`);

  await program.parseAsync(argv);
  return exitCode;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      console.error(chalk.red('❌ Fatal error:'), error);
      process.exit(1);
    });
}
