export function isTestEnv() {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === "test");
}

export function isCi() {
    return !!process.env.CI;
}

/** Unset and empty values read as undefined so config defaults apply. */
export function envString(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
    const v = env[name]?.trim();
    return v ? v : undefined;
}

/** "1", "true", "yes", "on" (any case) are true; anything else set is false. */
export function envFlag(name: string, env: NodeJS.ProcessEnv = process.env): boolean | undefined {
    const v = envString(name, env);
    if (v === undefined) return undefined;
    return ["1", "true", "yes", "on"].includes(v.toLowerCase());
}
