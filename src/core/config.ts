import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

export const BuildConfigSchema = z.object({
    cacheFile: z.string().min(1),
    remote: z.string().min(1),
    defaultMessage: z.string().min(1),
    browser: z.string().min(1),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    wsgiApp: z.string().min(1),
    requirementsFile: z.string().min(1),
    nodeAppDir: z.string().min(1),
    serverProcessPattern: z.string().min(1),
    editorPattern: z.string().min(1),
    windowTitle: z.string().min(1),
}).strict();

export type BuildConfig = z.infer<typeof BuildConfigSchema>;

export function defaultBrowser(platform: NodeJS.Platform = process.platform): string {
    switch (platform) {
        case 'win32':
            return 'explorer';
        case 'darwin':
            return 'open';
        default:
            return 'xdg-open';
    }
}

export function defaultConfig(platform: NodeJS.Platform = process.platform): BuildConfig {
    return {
        cacheFile: '.build_cache.json',
        remote: 'origin',
        defaultMessage: 'updated',
        browser: defaultBrowser(platform),
        host: '127.0.0.1',
        port: 8080,
        wsgiApp: 'app:app',
        requirementsFile: 'requirements.txt',
        nodeAppDir: 'nodejs-app',
        serverProcessPattern: 'waitress',
        editorPattern: 'code',
        windowTitle: 'Terminal',
    };
}

export class ConfigLoader {
    private configPath: string;

    constructor(workDir: string, explicitPath?: string) {
        if (explicitPath) {
            this.configPath = path.resolve(workDir, explicitPath);
            return;
        }
        const jsoncPath = path.join(workDir, 'build.config.jsonc');
        const jsonPath = path.join(workDir, 'build.config.json');

        if (fs.existsSync(jsoncPath)) {
            this.configPath = jsoncPath;
        } else {
            this.configPath = jsonPath;
        }
    }

    /** Missing file means defaults; anything present must validate. */
    async load(platform: NodeJS.Platform = process.platform): Promise<BuildConfig> {
        const defaults = defaultConfig(platform);
        if (!await fs.pathExists(this.configPath)) {
            return defaults;
        }

        const content = this.stripJsonComments(await fs.readFile(this.configPath, 'utf-8'));

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigError(`Invalid config JSON in ${this.configPath}: ${reason}`);
        }

        const parsed = BuildConfigSchema.partial().safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid config in ${this.configPath}: ${issues}`);
        }

        return { ...defaults, ...parsed.data };
    }

    getPath(): string {
        return this.configPath;
    }

    private stripJsonComments(content: string): string {
        return content.replace(/^\s*\/\/.*$/gm, '');
    }
}
