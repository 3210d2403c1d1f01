import { Logger } from 'homebridge/lib/logger';
import { createInterface } from 'readline/promises';

import { SecuritasClient } from './client';
import { parseConfig } from './config';

// Interactive login: answers the OTP challenge once and prints the device identity to store in the accessory config.
const config = parseConfig({
  username: process.env.SECURITAS_USERNAME,
  password: process.env.SECURITAS_PASSWORD,
  country: process.env.SECURITAS_COUNTRY,
  deviceId: process.env.SECURITAS_DEVICE_ID,
  uuid: process.env.SECURITAS_UUID,
  idDeviceIndigitall: process.env.SECURITAS_ID_DEVICE_INDIGITALL,
});

const client = new SecuritasClient(Logger.withPrefix(`Securitas`), config);

const run = async () => {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    let result = await client.login();
    if (result.kind === 'challenge') {
      const challenge = result;
      challenge.phones.forEach(phone => console.log(`  [${phone.id}] ${phone.phone}`));
      const phoneId = Number(await prompt.question('Send the code to phone: '));
      await client.sendOtp(challenge, phoneId);
      result = await client.submitOtp(challenge, (await prompt.question('OTP code: ')).trim());
    }

    console.log(`logged in as ${result.username}, add this to the accessory config:`);
    console.log(JSON.stringify(client.device, null, 2));

    for (const installation of await client.listInstallations()) {
      console.log(`installation ${installation.number} ${installation.alias} (${installation.panel}), perimetral: ${installation.perimetral}`);
    }
    const state = await client.getStatus();
    console.log(`got status`, state);
    for (const reading of await client.readSentinels()) {
      console.log(`sentinel ${reading.alias}: ${reading.temperature}°C ${reading.humidity}% ${reading.airQuality}`);
    }
  } finally {
    prompt.close();
  }
};

run().catch(err => {
  console.error(`[ERROR] ${err}`);
  process.exitCode = 1;
});
