import { z } from 'zod';
import { defineModel, types } from '../../src';
import type { NestedMap } from '../../src';

/** Small in-process model classes standing in for ORM-mapped rows. */

const formulaInit = z.object({
  id: z.number().nullable().default(null),
  title: z.string().nullable().default(null),
  author_id: z.number().nullable().default(null),
});

export class Formula {
  id: number | null;
  title: string | null;
  author_id: number | null;

  constructor(init: unknown = {}) {
    const p = formulaInit.parse(init);
    this.id = p.id;
    this.title = p.title;
    this.author_id = p.author_id;
  }
}

const alchemistInit = z.object({
  id: z.number().nullable().default(null),
  name: z.string().nullable().default(null),
  school_id: z.number().nullable().default(null),
  formulae: z.array(z.instanceof(Formula)).default(() => []),
});

export class Alchemist {
  id: number | null;
  name: string | null;
  school_id: number | null;
  formulae: Formula[];

  constructor(init: unknown = {}) {
    const p = alchemistInit.parse(init);
    this.id = p.id;
    this.name = p.name;
    this.school_id = p.school_id;
    this.formulae = p.formulae;
  }
}

const collegeInit = z.object({
  id: z.number().nullable().default(null),
  name: z.string().nullable().default(null),
  alchemists: z.array(z.instanceof(Alchemist)).default(() => []),
});

export class WizardCollege {
  id: number | null;
  name: string | null;
  alchemists: Alchemist[];

  constructor(init: unknown = {}) {
    const p = collegeInit.parse(init);
    this.id = p.id;
    this.name = p.name;
    this.alchemists = p.alchemists;
  }
}

const camelFormulaInit = z.object({
  id: z.number().nullable().default(null),
  title: z.string().nullable().default(null),
  camelAttribute: z.string().nullable().default(null),
});

export class CamelFormula {
  id: number | null;
  title: string | null;
  camelAttribute: string | null;

  constructor(init: unknown = {}) {
    const p = camelFormulaInit.parse(init);
    this.id = p.id;
    this.title = p.title;
    this.camelAttribute = p.camelAttribute;
  }
}

export const FormulaModel = defineModel({
  name: 'Formula',
  attributes: [
    { name: 'id', type: types.integer(), nullable: false, primaryKey: true },
    { name: 'title', type: types.string() },
    { name: 'author_id', type: types.integer() },
  ],
  create: (init) => new Formula(init),
});

export const AlchemistModel = defineModel({
  name: 'Alchemist',
  attributes: [
    { name: 'id', type: types.integer(), nullable: false, primaryKey: true },
    { name: 'name', type: types.string() },
    { name: 'school_id', type: types.integer() },
    { name: 'formulae', type: types.nested() },
  ],
  create: (init) => new Alchemist(init),
});

export const WizardCollegeModel = defineModel({
  name: 'WizardCollege',
  attributes: [
    { name: 'id', type: types.integer(), nullable: false, primaryKey: true },
    { name: 'name', type: types.string() },
    { name: 'alchemists', type: types.nested() },
  ],
  create: (init) => new WizardCollege(init),
});

export const CamelFormulaModel = defineModel({
  name: 'CamelFormula',
  attributes: [
    { name: 'id', type: types.integer(), nullable: false, primaryKey: true },
    { name: 'title', type: types.string() },
    { name: 'camelAttribute', type: types.string() },
  ],
  create: (init) => new CamelFormula(init),
});

/** A fresh nested map per call, so tests never share one. */
export function collegeNestedMap(): NestedMap {
  return {
    alchemists: {
      model: AlchemistModel,
      many: true,
      nested: {
        formulae: { model: FormulaModel, many: true },
      },
    },
  };
}

export function alchemistNestedMap(): NestedMap {
  return { formulae: { model: FormulaModel, many: true } };
}

/** Bogwarts with one alchemist who wrote one formula. */
export function buildSchool(): WizardCollege {
  const formula = new Formula({ id: 1, title: 'transmutation', author_id: 1 });
  const alchemist = new Alchemist({ id: 1, name: 'Albertus Magnus', school_id: 1, formulae: [formula] });
  return new WizardCollege({ id: 1, name: 'Bogwarts', alchemists: [alchemist] });
}
