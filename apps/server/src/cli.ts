import { writeFile } from "fs/promises";
import path from "path";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import { base32Decode, base32Encode } from "./lib/base32.js";
import { loadOtpConfig, type OtpConfig } from "./lib/config.js";
import type { OtpFailure } from "./lib/errors.js";
import { buildTotpUri } from "./lib/provisioning.js";
import { renderEnrollmentPage, renderQrSvg } from "./lib/qrcode.js";
import { generateSecret } from "./lib/secret.js";
import { generateTotp } from "./lib/totp.js";
import { parseSubmittedCode, verifyTotp } from "./lib/verifier.js";

const usage = `Usage:
  cli enroll [--label <name>] [--out <file.html>]
  cli code <base32-secret>`;

class CliError extends Error {
  constructor(failure: OtpFailure) {
    super(`${failure.kind}: ${failure.message}`);
    this.name = "CliError";
  }
}

async function enroll(config: OtpConfig, label: string, outFile: string) {
  const secret = generateSecret({ bits: config.secretBits });
  if (!secret.ok) throw new CliError(secret.error);

  const uri = buildTotpUri({
    issuer: config.issuer,
    label,
    secret: secret.value,
    digits: config.digits,
    period: config.period
  });
  const svg = renderQrSvg(uri);
  if (!svg.ok) throw new CliError(svg.error);

  await writeFile(outFile, renderEnrollmentPage(`TOTP enrollment for ${label}`, svg.value), "utf8");
  console.log(`Secret: ${base32Encode(secret.value)}`);
  console.log(`URI:    ${uri}`);
  console.log(`Open ${outFile} and scan the QR code with an authenticator app.`);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`Enter the ${config.digits}-digit code for ${label}: `);
    const submitted = parseSubmittedCode(answer);
    if (!submitted.ok) throw new CliError(submitted.error);
    if (submitted.value.digits !== config.digits) {
      throw new Error(`Code must have ${config.digits} digits`);
    }
    const match = verifyTotp(secret.value, submitted.value.code, {
      period: config.period,
      t0: config.t0,
      drift: config.drift,
      threshold: config.threshold,
      digits: config.digits
    });
    if (!match.ok) throw new CliError(match.error);
    console.log(`Valid code. Drift: ${match.value.steps - config.drift} steps (counter ${match.value.counter})`);
  } finally {
    rl.close();
  }
}

async function main(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      label: { type: "string" },
      out: { type: "string" }
    }
  });
  const config = loadOtpConfig();
  const [command, ...rest] = positionals;

  if (command === "enroll") {
    await enroll(config, values.label ?? "user", path.resolve(values.out ?? "totp-enrollment.html"));
    return;
  }
  if (command === "code" && rest[0]) {
    console.log(generateTotp(base32Decode(rest[0]), { period: config.period, t0: config.t0, digits: config.digits }));
    return;
  }
  console.error(usage);
  process.exitCode = 2;
}

main(process.argv.slice(2)).catch((error) => {
  console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
