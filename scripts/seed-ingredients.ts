import dotenv from 'dotenv';

import { loadConfig } from '../src/config.js';
import { INGREDIENT_LABELS } from '../src/ingredientLabels.js';
import { createSupabaseClient } from '../src/supabase.js';

dotenv.config();

const run = async () => {
  const supabase = createSupabaseClient(loadConfig().supabase);

  const { data: existingRows, error: existingError } = await supabase
    .from('ingredients')
    .select('ingr_name')
    .in('ingr_name', [...INGREDIENT_LABELS.values()]);
  if (existingError) {
    throw existingError;
  }

  const existing = new Set(
    (existingRows ?? []).map((row: { ingr_name?: unknown }) =>
      typeof row?.ingr_name === 'string' ? row.ingr_name : '',
    ),
  );

  const rows = [...INGREDIENT_LABELS.values()]
    .filter((name) => !existing.has(name))
    .map((name) => ({ ingr_name: name }));

  if (!rows.length) {
    console.log('No new ingredients to seed.');
    return;
  }

  const { error } = await supabase.from('ingredients').insert(rows);
  if (error) {
    throw error;
  }

  console.log(`Seeded ${rows.length} ingredients: ${rows.map((row) => row.ingr_name).join(', ')}`);
};

run().catch((error) => {
  console.error('Failed to seed ingredients:', error);
  process.exit(1);
});
