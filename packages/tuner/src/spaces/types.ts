/**
 * Range specification types: one entry per tuned hyperparameter.
 */

export interface FloatParameter {
	type: "float";
	name: string;
	low: number;
	high: number;
	step?: number;
	log?: boolean;
}

export interface IntParameter {
	type: "int";
	name: string;
	low: number;
	high: number;
	step?: number;
	log?: boolean;
}

export interface CategoricalParameter {
	type: "categorical";
	name: string;
	choices: (string | number | boolean)[];
}

export type SearchSpaceParameter = FloatParameter | IntParameter | CategoricalParameter;

export type SearchSpace = readonly SearchSpaceParameter[];
