#!/usr/bin/env node
import { loadConfig } from './config';
import { SecurityConsole } from './cli/security-console';
import { createTerminalPrompt } from './cli/prompt';
import { errorMessage } from './errors';
import { SecuritySystem } from './security-system';

async function main(): Promise<void> {
  const prompt = createTerminalPrompt();
  const config = loadConfig();

  // Stand-in delivery channel: the code is shown on the console
  const system = new SecuritySystem(config, {
    deliverCode: (username, code) => {
      prompt.print(`Identity verification for ${username}:`);
      prompt.print('In a real system, a verification code would be sent to your');
      prompt.print('registered email or phone. For this demo, use this code:');
      prompt.print(`SECURITY CODE: ${code}`);
    }
  });

  try {
    await new SecurityConsole(system, prompt).run();
  } finally {
    prompt.close();
  }
}

main().catch(error => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
