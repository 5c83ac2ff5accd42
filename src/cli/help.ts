import fs from "fs";
import path from "path";
import YAML from "yaml";
import chalk from "chalk";
import { suggestFromSpec } from "./helpSupport";

/**
 * Help schema: meta/context/categories.
 */
export interface HelpSpecMeta {
  program: string;
  version?: string;
  usage?: string;
  legend?: string[];
}

export interface HelpSpecContext {
  show?: boolean;
  items?: string[];
}

export interface HelpSpecCommand {
  id: string;
  name: string;
  usage?: string;
  description?: string;
  danger?: boolean;
  notes?: string[];
  examples?: string[];
  aliases?: string[];
}

export interface HelpSpecCategory {
  id: string;
  title: string;
  commands: HelpSpecCommand[];
}

export interface HelpSpec {
  meta?: HelpSpecMeta;
  context?: HelpSpecContext;
  categories: HelpSpecCategory[];
}

/**
 * Runtime context used for context header interpolation.
 */
export interface HelpRuntimeContext {
  configPath?: string;
  device?: string;
  surfaces?: string;
  logLevel?: string;
}

/** Sans filtre: toutes les catégories. */
export type HelpFilter =
  | { kind: "category"; value: string }
  | { kind: "command"; value: string }
  | { kind: "search"; value: string };

/** Habillage des lignes (couleurs en TTY, texte brut sinon). */
export interface HelpStyle {
  title: (s: string) => string;
  cmd: (s: string) => string;
  dim: (s: string) => string;
  danger: (s: string) => string;
}

const plain = (s: string): string => s;

export const PLAIN_STYLE: HelpStyle = { title: plain, cmd: plain, dim: plain, danger: plain };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optStrings(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.map(String) : undefined;
}

function parseCommand(raw: unknown): HelpSpecCommand | null {
  if (!isRecord(raw) || typeof raw.name !== "string") return null;
  return {
    id: optString(raw.id) ?? raw.name,
    name: raw.name,
    usage: optString(raw.usage),
    description: optString(raw.description),
    danger: raw.danger === true,
    notes: optStrings(raw.notes),
    examples: optStrings(raw.examples),
    aliases: optStrings(raw.aliases),
  };
}

/**
 * Valide le YAML parsé et construit la spécification d'aide.
 * @throws Erreur si `categories` est absent
 */
export function parseHelpSpec(raw: unknown): HelpSpec {
  if (!isRecord(raw) || !Array.isArray(raw.categories)) {
    throw new Error("help.yaml invalide: attendu { categories: [...] }");
  }
  const categories: HelpSpecCategory[] = [];
  for (const cat of raw.categories) {
    if (!isRecord(cat) || typeof cat.id !== "string") continue;
    const commands = Array.isArray(cat.commands) ? cat.commands.map(parseCommand) : [];
    categories.push({
      id: cat.id,
      title: optString(cat.title) ?? cat.id,
      commands: commands.filter((c): c is HelpSpecCommand => c !== null),
    });
  }
  const meta = isRecord(raw.meta)
    ? {
        program: optString(raw.meta.program) ?? "padrouter",
        version: optString(raw.meta.version),
        usage: optString(raw.meta.usage),
        legend: optStrings(raw.meta.legend),
      }
    : undefined;
  const context = isRecord(raw.context)
    ? { show: raw.context.show === true, items: optStrings(raw.context.items) }
    : undefined;
  return { meta, context, categories };
}

/**
 * Charger la spécification d'aide depuis `help.yaml`.
 */
export function loadHelpSpec(): HelpSpec {
  const filePath = path.resolve(__dirname, "help.yaml");
  const raw = fs.readFileSync(filePath, { encoding: "utf8" });
  return parseHelpSpec(YAML.parse(raw));
}

/** Catégorie par id exact, ou dont le titre contient la saisie. */
export function findCategory(spec: HelpSpec, query: string): HelpSpecCategory | undefined {
  const q = norm(query);
  if (!q) return undefined;
  return spec.categories.find((c) => c.id === q) ?? spec.categories.find((c) => norm(c.title).includes(q));
}

/** Commande par nom, id ou alias. */
export function findCommand(spec: HelpSpec, query: string): HelpSpecCommand | undefined {
  const q = norm(query);
  return spec.categories
    .flatMap((c) => c.commands)
    .find((cmd) => [cmd.id, cmd.name, ...(cmd.aliases ?? [])].some((k) => norm(k) === q));
}

/**
 * Lignes de l'aide: en-tête (usage, légende, contexte) puis
 * le détail d'une commande ou la liste des catégories retenues.
 */
export function renderHelp(
  spec: HelpSpec,
  runtime: HelpRuntimeContext = {},
  filter?: HelpFilter,
  style: HelpStyle = PLAIN_STYLE
): string[] {
  const lines = headerLines(spec, runtime, style);

  if (filter?.kind === "command") {
    const cmd = findCommand(spec, filter.value);
    if (cmd) return [...lines, ...commandLines(cmd, style)];
    lines.push(style.danger(`Commande inconnue: ${filter.value}`));
    const sugg = suggestFromSpec(spec, filter.value);
    if (sugg.length > 0) lines.push(style.dim(`Voulez-vous dire: ${sugg.join(", ")}`));
    return lines;
  }

  let categories = spec.categories;
  if (filter?.kind === "category") {
    const cat = findCategory(spec, filter.value);
    categories = cat ? [cat] : [];
  } else if (filter?.kind === "search") {
    const q = norm(filter.value);
    categories = spec.categories
      .map((cat) => ({ ...cat, commands: cat.commands.filter((cmd) => searchText(cmd).includes(q)) }))
      .filter((cat) => cat.commands.length > 0);
  }
  if (categories.length === 0) {
    lines.push(style.dim(`Aucune commande pour '${filter?.value ?? ""}'.`));
    return lines;
  }

  const col = Math.max(...categories.flatMap((c) => c.commands.map((cmd) => cmd.name.length)));
  for (const cat of categories) {
    lines.push(style.title(cat.title));
    for (const cmd of cat.commands) {
      const label = style.cmd(cmd.name.padEnd(col));
      lines.push(`  ${cmd.danger ? style.danger(label) : label}  ${cmd.description ?? ""}`.trimEnd());
      if (cmd.usage && cmd.usage !== cmd.name) lines.push("    " + style.dim(cmd.usage));
    }
    lines.push("");
  }
  lines.push(style.dim("'help <commande>' pour le détail, 'help search <texte>' pour chercher."));
  return lines;
}

/** Écrit l'aide sur stdout, en couleur si le terminal le permet. */
export function printHelp(spec: HelpSpec, runtime: HelpRuntimeContext = {}, filter?: HelpFilter): void {
  const useColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
  const style: HelpStyle = useColor
    ? { title: chalk.cyan.bold, cmd: chalk.white, dim: chalk.dim, danger: chalk.yellow }
    : PLAIN_STYLE;
  for (const line of renderHelp(spec, runtime, filter, style)) process.stdout.write(line + "\n");
}

function headerLines(spec: HelpSpec, runtime: HelpRuntimeContext, style: HelpStyle): string[] {
  const program = spec.meta?.program ?? "padrouter";
  const lines = [style.cmd(spec.meta?.usage ?? `${program} <commande> [arguments]`)];
  for (const l of spec.meta?.legend ?? []) lines.push(style.dim(l));
  if (spec.context?.show) {
    for (const item of spec.context.items ?? []) lines.push(style.dim(interpolateContext(item, runtime)));
    if (spec.meta?.version) lines.push(style.dim(`Version: ${spec.meta.version}`));
  }
  lines.push("");
  return lines;
}

function commandLines(cmd: HelpSpecCommand, style: HelpStyle): string[] {
  const lines = [style.cmd(cmd.name) + (cmd.description ? `: ${cmd.description}` : "")];
  if (cmd.usage) lines.push("  " + style.dim(`Usage: ${cmd.usage}`));
  for (const ex of cmd.examples ?? []) lines.push("  " + style.dim(`Ex.: ${ex}`));
  if (cmd.aliases && cmd.aliases.length > 0) lines.push("  " + style.dim(`Alias: ${cmd.aliases.join(", ")}`));
  for (const n of cmd.notes ?? []) lines.push("  " + (cmd.danger ? style.danger(n) : style.dim(n)));
  return lines;
}

function interpolateContext(template: string, ctx: HelpRuntimeContext): string {
  return template
    .replace(/\$\{config\.path\}/g, ctx.configPath ?? "-")
    .replace(/\$\{device\}/g, ctx.device ?? "-")
    .replace(/\$\{surfaces\}/g, ctx.surfaces ?? "-")
    .replace(/\$\{log\.level\}/g, ctx.logLevel ?? "info");
}

function searchText(cmd: HelpSpecCommand): string {
  return [cmd.name, cmd.usage, cmd.description, ...(cmd.aliases ?? [])].filter(Boolean).join("\n").toLowerCase();
}

function norm(s: string): string {
  return s.trim().toLowerCase();
}
