import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/pathfilter": {
      entry: ["src/index.ts", "examples/*.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts", "examples/**/*.ts"],
      ignore: ["tests/**/*-utils.ts"],
    },
  },
};

export default config;
