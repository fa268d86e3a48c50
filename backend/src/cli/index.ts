#!/usr/bin/env node
import { createInterface } from 'readline/promises';
import { config } from '../config/env';
import { runSession } from './session';

const main = async () => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await runSession(
      {
        ask: (question) => rl.question(question),
        print: (text) => console.log(text),
      },
      {
        databasePath: config.databasePath,
        minExamCount: config.minExamCount,
        maxExamCount: config.maxExamCount,
      }
    );
  } finally {
    rl.close();
  }
};

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
