import { defineConfig } from "@trigger.dev/sdk/v3";

export default defineConfig({
  project: process.env.TRIGGER_PROJECT_REF ?? "proj_placeholder",
  dirs: ["./src/trigger"],
  retries: {
    enabledInDev: false,
    default: {
      maxAttempts: 2,
      minTimeoutInMs: 1000,
      maxTimeoutInMs: 30000,
      factor: 2,
      randomize: true,
    },
  },
  maxDuration: 3600, // crawls page slowly on purpose
  build: {
    extensions: [
      {
        name: "libsql-native",
        onBuildComplete: async (context) => {
          if (context.target === "deploy") {
            context.addLayer({
              id: "libsql-native-deps",
              commands: [
                "npm install @libsql/linux-x64-gnu --no-save",
              ],
            });
          }
        },
      },
      {
        // FETCH_MODE=browser drives an installed Chrome through puppeteer-core
        name: "chrome",
        onBuildComplete: async (context) => {
          if (context.target === "deploy" || context.target === "dev") {
            context.addLayer({
              id: "google-chrome",
              image: {
                instructions: [
                  "RUN apt-get update && apt-get install -y wget gnupg ca-certificates",
                  "RUN wget -q -O - https://dl-ssl.google.com/linux/linux_signing_key.pub | apt-key add -",
                  "RUN sh -c 'echo \"deb [arch=amd64] http://dl.google.com/linux/chrome/deb/ stable main\" >> /etc/apt/sources.list.d/google.list'",
                  "RUN apt-get update && apt-get install -y google-chrome-stable fonts-wqy-zenhei --no-install-recommends",
                  "RUN rm -rf /var/lib/apt/lists/*"
                ],
              },
            });
          }
        },
      },
    ],
  },
});
