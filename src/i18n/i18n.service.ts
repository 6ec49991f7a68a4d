import { Injectable, Logger } from '@nestjs/common';
import en from './locales/en.json';

export type MessageVars = Record<string, string | number>;

type Catalogue = { [key: string]: string | Catalogue };

// Add a locale by dropping its catalogue next to en.json and listing it here
const CATALOGUES: Record<string, Catalogue> = { en };

@Injectable()
export class I18nService {
    private readonly logger = new Logger(I18nService.name);

    private catalogue(locale: string): Catalogue {
        const found = CATALOGUES[locale];
        if (!found) {
            this.logger.debug(`No catalogue for ${locale}, fallback to en`);
            return CATALOGUES.en;
        }
        return found;
    }

    private lookup(catalogue: Catalogue, key: string): string | undefined {
        let cur: string | Catalogue | undefined = catalogue;
        for (const part of key.split('.')) {
            if (cur === undefined || typeof cur === 'string') return undefined;
            cur = cur[part];
        }
        return typeof cur === 'string' ? cur : undefined;
    }

    t(key: string, locale = 'en', vars?: MessageVars): string {
        const str = this.lookup(this.catalogue(locale), key) ?? this.lookup(CATALOGUES.en, key) ?? key;

        if (!vars) return str;
        return str.replace(/\{\{(\w+)\}\}/g, (_, name: string) => (name in vars ? String(vars[name]) : ''));
    }
}
