import { DEFAULT_ITERATIONS, DEFAULT_LOG_FILE, DEFAULT_MESSAGE } from '@ticklog/core';

const pad = (label: string, width: number) => label.padEnd(width, ' ');

export const printCliUsage = (print: (line: string) => void = line => console.log(line)): void => {
  print('Usage: npm start -- [options]');
  print('');
  print('Options:');
  print(`  ${pad('-h, --help', 20)}Show this message and exit`);
  print(`  ${pad('-e, --env-dir <dir>', 20)}Directory to load .env.local from (default: cwd)`);
  print('');
  print('Environment:');
  print(`  ${pad('LOG_MESSAGE', 20)}Message written on every iteration (default: "${DEFAULT_MESSAGE}")`);
  print(`  ${pad('ITERATIONS', 20)}Number of iterations (default: ${DEFAULT_ITERATIONS})`);
  print(`  ${pad('LOG_FILE', 20)}File to append to (default: ${DEFAULT_LOG_FILE})`);
  print('');
  print('Examples:');
  print('  LOG_MESSAGE=Hello ITERATIONS=3 npm start');
  print('  LOG_FILE=./app.log npm start -- -e ./config');
};
