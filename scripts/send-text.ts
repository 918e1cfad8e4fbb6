#!/usr/bin/env npx tsx
/**
 * Send one text through a carrier gateway.
 *
 * Uses EMAIL_ADDRESS / EMAIL_PASSWORD from the environment (or .env) and the
 * same SMTP sender as the relay.
 *
 * Usage:
 *   npm run send-text -- --phone 5555550100 --carrier tmobile "Hello!"
 *   npm run send-text -- -p 5555550100 -c verizon -s "Reminder" "Water the plants"
 */

import 'dotenv/config';
import { loadCarrierDirectory } from '../src/services/carriers/index.js';
import { SmtpOutboundSender } from '../src/services/mail/index.js';

interface Options {
  phone: string;
  carrier: string;
  subject: string | undefined;
  message: string;
}

function parseArgs(args: string[]): Options {
  const options: Options = {
    phone: '',
    carrier: '',
    subject: undefined,
    message: '',
  };

  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--phone' || arg === '-p') {
      options.phone = args[++i] || options.phone;
    } else if (arg === '--carrier' || arg === '-c') {
      options.carrier = args[++i] || options.carrier;
    } else if (arg === '--subject' || arg === '-s') {
      options.subject = args[++i] || undefined;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  options.message = positional.join(' ');

  return options;
}

function printHelp(): void {
  console.log(`
Gateway Text CLI

Usage:
  npm run send-text -- --phone <digits> --carrier <id> [--subject <text>] "message"

Options:
  --phone, -p       Recipient phone number (digits)
  --carrier, -c     Carrier id from the carriers file (e.g. verizon, tmobile)
  --subject, -s     Optional subject line (omitted when not given)
  --help, -h        Show this help message
`);
}

async function sendText(options: Options): Promise<void> {
  const user = process.env.EMAIL_ADDRESS;
  const password = process.env.EMAIL_PASSWORD;
  if (!user || !password) {
    console.error('Error: EMAIL_ADDRESS and EMAIL_PASSWORD must be set');
    process.exit(1);
  }
  if (!options.phone || !options.carrier || !options.message) {
    console.error('Error: --phone, --carrier and a message are required');
    printHelp();
    process.exit(1);
  }

  const carriers = loadCarrierDirectory(process.env.CARRIERS_FILE || './config/carriers.json');
  const sender = new SmtpOutboundSender(
    {
      user,
      password,
      host: process.env.SMTP_HOST || 'smtp.gmail.com',
      port: parseInt(process.env.SMTP_PORT || '587', 10),
    },
    carriers
  );

  if (!(await sender.verify())) {
    console.error('Error: SMTP login failed; check EMAIL_ADDRESS, EMAIL_PASSWORD and SMTP_HOST');
    process.exit(1);
  }

  const result = await sender.send({
    phoneNumber: options.phone,
    carrierId: options.carrier,
    body: options.message,
    subject: options.subject,
  });

  if (!result.success) {
    console.error(`Failed to send message to ${options.phone} (${options.carrier}): ${result.error}`);
    process.exit(1);
  }
  console.log(`Message sent to ${options.phone} (${options.carrier}) successfully.`);
}

// Parse arguments (skip node and script path)
const args = process.argv.slice(2);

sendText(parseArgs(args)).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
