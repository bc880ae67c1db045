import type { AutocompleteInteraction } from 'discord.js';
import type { Database } from '../services/database.js';

const MAX_CHOICES = 25;

/** Autocomplete for integer `id` options: matches on id or URL. */
export async function respondWithProducts(interaction: AutocompleteInteraction, db: Database): Promise<void> {
  const focused = String(interaction.options.getFocused()).trim().toLowerCase();

  const choices = db
    .listProducts()
    .filter(p => !focused || String(p.id).startsWith(focused) || p.url.toLowerCase().includes(focused))
    .slice(0, MAX_CHOICES)
    .map(p => ({
      name: `#${p.id} ${p.active ? '' : '(paused) '}${p.url}`.slice(0, 100),
      value: p.id,
    }));

  await interaction.respond(choices);
}

export const SITE_CHOICES = [
  { name: 'Amazon', value: 'amazon' },
  { name: 'Flipkart', value: 'flipkart' },
  { name: 'Other (generic)', value: 'generic' },
] as const;
