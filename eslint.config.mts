// CHANGE: Lint rules for the checker (flat config, loaded through jiti)
// PURITY: SHELL (configuration only)
// INVARIANT: CORE and SHELL code stays in the Effect idiom: no async, no Promise types, no switch

import eslint from "@eslint/js";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";
import vitest from "eslint-plugin-vitest";
import { defineConfig } from "eslint/config";
import globals from "globals";
import tseslint from "typescript-eslint";

const effectOnly = "use Effect.gen, Effect.tryPromise or Effect.all instead";

const restrictedSyntax = [
	{
		selector: "TSUnknownKeyword",
		message: "No 'unknown': model the value with a union or a type guard.",
	},
	{
		selector: "SwitchStatement",
		message:
			"No switch: use ts-pattern match(value).with(...).exhaustive() over the tag.",
	},
	{
		selector: 'CallExpression[callee.name="require"]',
		message: "No require(): the package is ESM, use import.",
	},
	{
		selector: "ThrowStatement > Literal:not([value=/^\\w+Error:/])",
		message: "Throw an Error instance, or better, fail with a tagged error.",
	},
	{
		selector:
			"FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
		message: `No async functions: ${effectOnly}.`,
	},
	{
		selector: "NewExpression[callee.name='Promise']",
		message: `No new Promise: ${effectOnly}.`,
	},
	{
		selector: "CallExpression[callee.object.name='Promise']",
		message: `No Promise.* combinators: ${effectOnly}.`,
	},
];

const restrictedTypes = {
	unknown: {
		message: "No 'unknown': narrow the value where it enters the program.",
	},
	Promise: {
		message: "Return Effect.Effect<A, E> instead of a Promise.",
		suggest: ["Effect.Effect"],
	},
	"Promise<*>": {
		message: "Return Effect.Effect<A, E> instead of Promise<A>.",
		suggest: ["Effect.Effect<A, E>"],
	},
};

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		files: ["**/*.ts"],
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			complexity: ["error", 8],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true, allowBoolean: true },
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{
					"ts-ignore": true,
					"ts-nocheck": true,
					"ts-expect-error": true,
					"ts-check": true,
				},
			],
			"@eslint-community/eslint-comments/no-use": "error",
			"@eslint-community/eslint-comments/no-unlimited-disable": "error",
			"@eslint-community/eslint-comments/disable-enable-pair": "error",
			"@eslint-community/eslint-comments/no-unused-disable": "error",
			"no-restricted-syntax": ["error", ...restrictedSyntax],
			"@typescript-eslint/no-restricted-types": [
				"error",
				{ types: restrictedTypes },
			],
			"@typescript-eslint/use-unknown-in-catch-callback-variable": "off",
			"no-throw-literal": "off",
			"@typescript-eslint/only-throw-error": [
				"error",
				{ allowThrowingUnknown: false, allowThrowingAny: false },
			],
		},
	},
	{
		// Programmatic entry: the one place a Promise leaves the program
		files: ["src/main.ts"],
		rules: { "@typescript-eslint/no-restricted-types": "off" },
	},
	{
		...vitest.configs.all,
		files: ["test/**/*.ts"],
		languageOptions: {
			globals: { ...vitest.environments.env.globals },
		},
		rules: {
			...vitest.configs.all.rules,
			"@eslint-community/eslint-comments/no-use": "off",
			"max-lines-per-function": "off",
		},
	},
	{
		files: ["**/*.{js,cjs,mjs}"],
		extends: [tseslint.configs.disableTypeChecked],
	},
	{ ignores: ["dist/**", "coverage/**"] },
);
