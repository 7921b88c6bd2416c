import { Command } from "commander";
import { loadRunConfig, type CliFlags } from "../services/config.js";
import { checkTools, installHint } from "../services/preflight.js";

export const doctorCommand = new Command("doctor")
  .description("Diagnose git, the repository and the Ollama server")
  .action(async (_opts: unknown, cmd: Command) => {
    const cfg = await loadRunConfig(process.cwd(), cmd.optsWithGlobals<CliFlags>());
    const results = await checkTools(cfg);

    for (const r of results) {
      if (r.ok) {
        console.log(`✅ ${r.name} ${r.version ?? ""}`.trim());
      } else {
        console.log(`❌ ${r.name} ${r.message ? `- ${r.message}` : ""}`.trim());
        console.log(`   ↳ ${installHint(r.name)}`);
      }
    }

    const hardMissing = results.filter(r => r.required && !r.ok);
    if (hardMissing.length) process.exitCode = 1;
  });
