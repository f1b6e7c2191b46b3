#!/usr/bin/env node
/**
 * lexcov CLI entry point.
 *
 * Commands: coverage, analyze
 */
import { existsSync, readFileSync } from "node:fs";

// Load .env.local (no dotenv dependency)
if (existsSync(".env.local")) {
  const envContent = readFileSync(".env.local", "utf8");
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}
import { coverageCmd } from "./commands/coverage.js";
import { analyzeCmd } from "./commands/analyze.js";
import { listImplementations } from "./resolve.js";

const USAGE = `
lexcov: vocabulary coverage for a body of text

Commands:
  coverage         Words needed to cover a share of a text (CSV word list)
  analyze          Full text analysis report

Options:
  --input=<path>         Text, HTML or EPUB file
  --percentage=<0-100>   Coverage target (coverage)
  --count=<n>            Number of top words (coverage)
  --top=<n>              Top words in the report (analyze, default 100)
  --out=<path>           Output file
  --format=words|full    CSV layout (coverage, default words)
  --lemmatize            Count base forms (needs --dictionary)
  --dictionary=<path>    Lexicon: form<TAB>lemma[<TAB>pos] per line
  --stopwords=<ru|path>  Exclude stopwords
  --vowels=<chars>       Vowel letters for syllable counts
  --config=<path>        JSON file of options; flags override it
  --logLevel=<level>     debug, info, warn, error
  --help, -h             Show this help

Examples:
  lexcov coverage --input=book.epub --percentage=80
  lexcov coverage --input=book.txt --count=500 --format=full --out=top500.csv
  lexcov analyze --input=book.epub --dictionary=ru.tsv --stopwords=ru
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    console.log();
    console.log(listImplementations());
    process.exit(0);
  }

  const command = args[0];

  if (command === "coverage") {
    await coverageCmd(args.slice(1));
  } else if (command === "analyze") {
    await analyzeCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
