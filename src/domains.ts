export const COUNTRIES = ['AR', 'BR', 'CL', 'ES', 'FR', 'GB', 'IE', 'IT'] as const;

export type Country = (typeof COUNTRIES)[number];

const API_URLS: Record<Country, string> = {
    AR: 'https://customers.verisure.com.ar/owa-api/graphql',
    BR: 'https://customers.verisure.com.br/owa-api/graphql',
    CL: 'https://customers.verisure.cl/owa-api/graphql',
    ES: 'https://customers.securitasdirect.es/owa-api/graphql',
    FR: 'https://customers.securitasdirect.fr/owa-api/graphql',
    GB: 'https://customers.verisure.co.uk/owa-api/graphql',
    IE: 'https://customers.verisure.ie/owa-api/graphql',
    IT: 'https://customers.verisure.it/owa-api/graphql',
};

// BR is not Portuguese on purpose, the backend expects "br"
const LANGUAGES: Record<Country, string> = {
    AR: 'ar',
    BR: 'br',
    CL: 'es',
    ES: 'es',
    FR: 'fr',
    GB: 'en',
    IE: 'en',
    IT: 'it',
};

const DEFAULT_LANGUAGE = 'en';

const KNOWN: readonly string[] = COUNTRIES;

export function isKnownCountry(country: string): country is Country {
    return KNOWN.includes(country);
}

export function apiUrlFor(country: string): string {
    const code = country.toUpperCase();
    if (isKnownCountry(code)) {
        return API_URLS[code];
    }

    return `https://customers.securitasdirect.${code.toLowerCase()}/owa-api/graphql`;
}

export function languageFor(country: string): string {
    const code = country.toUpperCase();
    return isKnownCountry(code) ? LANGUAGES[code] : DEFAULT_LANGUAGE;
}

/**
 * Request name the backend gives the Sentinel comfort service, which depends on the account language.
 */
export function sentinelServiceName(language: string): string {
    switch (language) {
        case 'br':
        case 'pt':
            return 'COMFORTO';
        default:
            return 'CONFORT';
    }
}
