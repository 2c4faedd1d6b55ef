import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/*.test.ts"],
        env: {
            LOG_LEVEL: "silent",
            // the transport tests talk to an in-process server
            no_proxy: "127.0.0.1,localhost",
            NO_PROXY: "127.0.0.1,localhost"
        }
    }
});
