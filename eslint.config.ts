import eslint from "@eslint/js";
import markdown from "@eslint/markdown";
import jsonc from "eslint-plugin-jsonc";
import tseslint from "typescript-eslint";
import type { Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

const TEST_SUFFIXES = [".unit.test.ts", ".integration.test.ts"];

// Suites are run by an explicit file list, so every test file must say which
// kind it is.
const testFileNamingRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: { description: "Require .unit.test.ts or .integration.test.ts test files" },
		messages: {
			invalidTestFileName: "Test file must end with .unit.test.ts or .integration.test.ts. Found: '{{actual}}'",
		},
	},
	create(context) {
		const filename = context.filename;
		return {
			Program() {
				if (TEST_SUFFIXES.some(suffix => filename.endsWith(suffix))) return;
				context.report({
					loc: { column: 0, line: 1 },
					messageId: "invalidTestFileName",
					data: { actual: filename },
				});
			},
		};
	},
};

// Same priority order scripts/generate-schemas.ts writes.
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "$defs",
	"title", "description", "type", "const", "enum", "default",
	"properties", "additionalProperties", "required",
	"items", "minItems", "maxItems",
	"oneOf", "anyOf", "allOf", "not",
	"minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum",
	"minLength", "maxLength", "pattern", "format",
];

const jsoncPlugin = { jsonc };

const formatting = {
	indent: ["error", "tab"],
	quotes: ["error", "double", { avoidEscape: true }],
} as const;

export default [
	{ ignores: ["dist/**", "node_modules/**", "coverage/**", "*.config.ts"] },

	{
		files: ["test/**/*.test.ts"],
		plugins: { vqir: { rules: { "test-file-naming": testFileNamingRule } } },
		rules: { "vqir/test-file-naming": "error" },
	},

	{ ...eslint.configs.recommended, files: ["**/*.ts"] },

	// Library sources: type-aware, no assertions
	...[...tseslint.configs.strictTypeChecked, ...tseslint.configs.stylisticTypeChecked].map(config => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		linterOptions: { noInlineConfig: true },
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			...formatting,
			"@typescript-eslint/restrict-template-expressions": ["error", { allowNumber: true }],
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			"@typescript-eslint/non-nullable-type-assertion-style": "off",
		},
	},

	// Tests and scripts
	...tseslint.configs.recommended.map(config => ({
		...config,
		files: ["test/**/*.ts", "scripts/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts", "scripts/**/*.ts"],
		rules: {
			...formatting,
			"@typescript-eslint/ban-ts-comment": "error",
		},
	},

	// JSON: tabs, sorted keys
	...jsonc.configs["flat/recommended-with-json"].map(config => ({
		...config,
		files: ["**/*.json"],
	})),
	{
		files: ["**/*.json"],
		rules: {
			"jsonc/indent": ["error", "tab"],
			"jsonc/sort-keys": ["error", { pathPattern: ".*", order: { type: "asc" } }],
		},
	},
	{
		files: ["package.json"],
		plugins: jsoncPlugin,
		rules: {
			"jsonc/sort-keys": ["error",
				{
					pathPattern: "^$",
					order: [
						"name", "version", "private", "description", "license", "type",
						"main", "types", "exports", "bin", "scripts",
						"dependencies", "devDependencies", "engines",
					],
				},
				{ pathPattern: ".", order: { type: "asc" } },
			],
		},
	},
	{
		files: ["schemas/*.schema.json"],
		plugins: jsoncPlugin,
		rules: {
			"jsonc/sort-keys": ["error",
				{ pathPattern: ".", hasProperties: ["$ref"], order: ["$ref"] },
				{ pathPattern: ".", hasProperties: ["type"], order: jsonSchemaKeyOrder },
				{ pathPattern: "^$", order: jsonSchemaKeyOrder },
				{ pathPattern: ".", order: { type: "asc" } },
			],
		},
	},

	// Markdown docs; embedded JSON blocks are illustrative
	...markdown.configs.recommended.map(config => ({ ...config, files: ["**/*.md"] })),
	{
		files: ["**/*.md"],
		plugins: jsoncPlugin,
		rules: {
			"markdown/fenced-code-language": "off",
			"jsonc/sort-keys": "off",
		},
	},
] satisfies ConfigArray;
