import { describe, expect, it } from 'vitest';

import { apiUrlFor, isKnownCountry, languageFor, sentinelServiceName } from '../src/domains';

describe('domains', () => {
    it('uses the fixed endpoint of a known country', () => {
        expect(apiUrlFor('ES')).toBe('https://customers.securitasdirect.es/owa-api/graphql');
        expect(apiUrlFor('gb')).toBe('https://customers.verisure.co.uk/owa-api/graphql');
        expect(apiUrlFor('BR')).toBe('https://customers.verisure.com.br/owa-api/graphql');
    });

    it('derives the endpoint of any other country', () => {
        expect(isKnownCountry('PT')).toBe(false);
        expect(apiUrlFor('PT')).toBe('https://customers.securitasdirect.pt/owa-api/graphql');
    });

    it.each([
        ['BR', 'br'],
        ['CL', 'es'],
        ['ES', 'es'],
        ['FR', 'fr'],
        ['GB', 'en'],
        ['IE', 'en'],
        ['IT', 'it'],
        ['AR', 'ar'],
        ['NL', 'en'],
        ['it', 'it'],
    ])('maps %s to language %s', (country, language) => {
        expect(languageFor(country)).toBe(language);
    });

    it('localizes the Sentinel service name', () => {
        expect(sentinelServiceName('br')).toBe('COMFORTO');
        expect(sentinelServiceName('pt')).toBe('COMFORTO');
        expect(sentinelServiceName('es')).toBe('CONFORT');
        expect(sentinelServiceName('en')).toBe('CONFORT');
    });
});
