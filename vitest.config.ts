import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			reporter: ["text"],
			include: ["packages/**/src/**/*.ts"],
			exclude: ["**/*.d.ts"],
		},
		projects: [
			{
				test: {
					name: "node",
					environment: "node",
					include: ["./packages/**/*.{test,spec}.ts"],
					exclude: ["node_modules/**", "dist/**"],
				},
			},
		],
	},
});
