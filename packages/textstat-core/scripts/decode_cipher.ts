import { promises as fs } from "node:fs";
import path from "node:path";
import { unigramWordModel } from "../src/ngram";
import { PermutationDecoder } from "../src/permutation/decoder";
import { segment } from "../src/segment";
import { ShiftDecoder } from "../src/shift";
import { words } from "../src/tokenizer";

type Mode = "shift" | "permutation" | "segment";

type Config = {
  trainPath: string;
  text: string;
  mode: Mode;
};

const DEFAULT_CONFIG: Config = {
  trainPath: path.resolve("corpus/train.txt"),
  text: "",
  mode: "shift"
};

function parseMode(value: string): Mode {
  if (value === "shift" || value === "permutation" || value === "segment") return value;
  throw new Error(`unknown mode "${value}" (expected shift, permutation or segment)`);
}

function parseArgs(): Config {
  const cfg: Config = { ...DEFAULT_CONFIG };
  for (const arg of process.argv.slice(2)) {
    const eq = arg.indexOf("=");
    if (eq < 0) continue;
    const key = arg.slice(0, eq);
    const value = arg.slice(eq + 1);
    switch (key) {
      case "--train":
        cfg.trainPath = path.resolve(value);
        break;
      case "--text":
        cfg.text = value;
        break;
      case "--mode":
        cfg.mode = parseMode(value);
        break;
      default:
        break;
    }
  }
  return cfg;
}

async function main(): Promise<void> {
  const cfg = parseArgs();
  if (!cfg.text) throw new Error("nothing to decode: pass --text=...");

  const training = await fs.readFile(cfg.trainPath, "utf8");
  console.log(`[decode] training: ${cfg.trainPath} (${words(training).length} words)`);

  const t0 = performance.now();
  switch (cfg.mode) {
    case "shift":
      console.log(`[decode] plaintext: ${new ShiftDecoder(training).decode(cfg.text)}`);
      break;
    case "permutation": {
      const out = new PermutationDecoder(training).decode(cfg.text);
      const pairs = Object.entries(out.mapping).map(([c, p]) => `${c}->${p}`);
      console.log(`[decode] plaintext: ${out.plaintext}`);
      console.log(`[decode] mapping: ${pairs.join(" ")}`);
      console.log(`[decode] expanded: ${out.expanded}`);
      break;
    }
    case "segment": {
      const out = segment(cfg.text, unigramWordModel(words(training)));
      console.log(`[decode] words: ${out.words.join(" ")}`);
      console.log(`[decode] probability: ${out.probability}`);
      break;
    }
  }
  console.log(`[decode] ms: ${(performance.now() - t0).toFixed(2)}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
