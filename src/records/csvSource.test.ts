import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SourceError } from '../errors';
import { parseCardRows, readCardRows } from './csvSource';

const HEADER = 'name,cost,type,subtype,color,art_file,strength,description';

describe('parseCardRows', () => {
  it('keys cells by lower-cased header and numbers rows from 1', () => {
    const rows = parseCardRows(
      [
        'Name,Cost,Type,Subtype,Color,Art_File,Strength,Description',
        'Test Bear,{1}{G},Creature,Bear,Green,,2,"Whenever Test Bear attacks, it gets +1/+0."',
        'Shock,{R},Spell,,Red,,,Deal 2 damage.',
      ].join('\n'),
    );

    expect(rows).toHaveLength(2);
    expect(rows[0].rowIndex).toBe(1);
    expect(rows[0].cells.name).toBe('Test Bear');
    expect(rows[0].cells.description).toBe('Whenever Test Bear attacks, it gets +1/+0.');
    expect(rows[1]).toEqual({
      rowIndex: 2,
      cells: {
        name: 'Shock',
        cost: '{R}',
        type: 'Spell',
        subtype: '',
        color: 'Red',
        art_file: '',
        strength: '',
        description: 'Deal 2 damage.',
      },
    });
  });

  it('accepts columns in any order and extra columns', () => {
    const rows = parseCardRows(
      ['description,toughness,strength,art_file,color,subtype,type,cost,name', 'Big.,5,4,,Green,Bear,Creature,{3},Big Bear'].join('\n'),
    );
    expect(rows[0].cells.name).toBe('Big Bear');
    expect(rows[0].cells.toughness).toBe('5');
  });

  it('strips a byte-order mark and skips blank lines', () => {
    const rows = parseCardRows(`\uFEFF${HEADER}\n\nShock,{R},Spell,,Red,,,Deal 2 damage.\n\n`);
    expect(rows).toHaveLength(1);
    expect(rows[0].cells.name).toBe('Shock');
  });

  it('trims whitespace around cells and header names', () => {
    const rows = parseCardRows(` name , cost,type,subtype,color,art_file,strength,description\n  Shock , {R} ,Spell,,Red,,, Deal 2 damage. `);
    expect(rows[0].cells.name).toBe('Shock');
    expect(rows[0].cells.cost).toBe('{R}');
    expect(rows[0].cells.description).toBe('Deal 2 damage.');
  });

  it('names every missing column', () => {
    expect(() => parseCardRows('name,cost,type\nA,{1},Spell', 'cards.csv')).toThrow(
      'cards.csv: missing required column(s): subtype, color, art_file, strength, description',
    );
  });
});

describe('readCardRows', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'card-press-csv-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads rows from disk', async () => {
    const file = join(tempDir, 'cards.csv');
    await writeFile(file, `${HEADER}\nShock,{R},Spell,,Red,,,Deal 2 damage.\n`);

    const rows = await readCardRows(file);
    expect(rows.map((row) => row.cells.name)).toEqual(['Shock']);
  });

  it('reports a missing file as SourceError', async () => {
    const file = join(tempDir, 'missing.csv');
    await expect(readCardRows(file)).rejects.toBeInstanceOf(SourceError);
  });
});
