import { describe, test, expect, beforeEach } from 'vitest';

import { DataSourceError } from '../../model/Errors.ts';
import { tableFromMatrix } from '../../source/TableSource.ts';
import { AddressDirectory, formatDisplay, makeManualAddress } from '../AddressDirectory.ts';
import { addressTable } from '../../__tests__/referenceData.ts';

const CITIES = new Map([
    ['4000', 'Roskilde'],
    ['4100', 'Ringsted'],
]);

describe('AddressDirectory', () => {
    let directory: AddressDirectory;

    beforeEach(() => {
        directory = new AddressDirectory();
        directory.load(addressTable(), CITIES);
    });

    describe('load', () => {
        test('builds display text and keys for every row', () => {
            expect(directory.size).toBe(4);
            expect(directory.all().map((a) => a.display)).toEqual([
                'Maglehøjen 10, 4000 Roskilde',
                'Hovedgaden 12, 4000 Roskilde',
                'Hovedgaden 12A, 4000 Roskilde',
                'Skolevej 7B, 4100 Ringsted',
            ]);
        });

        test('indexes addresses by normalized key', () => {
            const address = directory.getByNormKey('HOVEDGADEN 12 A 4000');

            expect(address).toEqual({
                kind: 'known',
                display: 'Hovedgaden 12A, 4000 Roskilde',
                normKey: 'HOVEDGADEN 12 A 4000',
                districtNo: '101',
                street: 'Hovedgaden',
                houseNo: '12',
                houseLetter: 'A',
                postcode: '4000',
                city: 'Roskilde',
            });
            expect(directory.districtForNormKey('SKOLEVEJ 7 B 4100')).toBe('102');
            expect(directory.districtForNormKey('SKOLEVEJ 8 4100')).toBeNull();
        });

        test('duplicate keys keep the first row', () => {
            directory.load(addressTable([
                ['Hovedgaden', '12', '', '4000', '101'],
                ['HOVEDGADEN', ' 12 ', '', '4000', '999'],
            ]), CITIES);

            expect(directory.size).toBe(1);
            expect(directory.districtForNormKey('HOVEDGADEN 12 4000')).toBe('101');
        });

        test('city is blank without a postcode lookup', () => {
            directory.load(addressTable([['Skolevej', '7', 'B', '4100', '102']]));

            expect(directory.all()[0]?.display).toBe('Skolevej 7B, 4100');
            expect(directory.all()[0]?.city).toBe('');
        });

        test('missing columns fail the load', () => {
            const table = tableFromMatrix('adresser.csv', [['Vejnavn', 'Hus nummer', 'Postnummer']]);

            expect(() => directory.load(table)).toThrow(DataSourceError);
            expect(() => directory.load(table)).toThrow(/Missing columns: Hus bogstav, Distrikt nummer/);
        });
    });

    describe('findByComponents', () => {
        test('matches street case-insensitively and number exactly', () => {
            const hits = directory.findByComponents('hovedgaden', '12');
            expect(hits.map((a) => a.display)).toEqual([
                'Hovedgaden 12, 4000 Roskilde',
                'Hovedgaden 12A, 4000 Roskilde',
            ]);
        });

        test('a given house letter must match', () => {
            const hits = directory.findByComponents('Hovedgaden', '12', 'a');
            expect(hits.map((a) => a.display)).toEqual(['Hovedgaden 12A, 4000 Roskilde']);
        });

        test('respects the limit', () => {
            expect(directory.findByComponents('Hovedgaden', '12', '', 1)).toHaveLength(1);
        });

        test('no match on a different number', () => {
            expect(directory.findByComponents('Hovedgaden', '13')).toEqual([]);
        });
    });

    describe('findFuzzyStreetHouse', () => {
        test('finds a misspelt street', () => {
            const hits = directory.findFuzzyStreetHouse('Hovedgadn', '12');
            expect(hits.map((a) => a.display)).toEqual([
                'Hovedgaden 12, 4000 Roskilde',
                'Hovedgaden 12A, 4000 Roskilde',
            ]);
        });

        test('a matching house letter ranks higher', () => {
            const hits = directory.findFuzzyStreetHouse('Hovedgadn', '12', 'A');
            expect(hits.map((a) => a.display)).toEqual([
                'Hovedgaden 12A, 4000 Roskilde',
                'Hovedgaden 12, 4000 Roskilde',
            ]);
        });

        test('house number is never fuzzy', () => {
            expect(directory.findFuzzyStreetHouse('Hovedgaden', '13')).toEqual([]);
        });

        test('blank street or number gives no candidates', () => {
            expect(directory.findFuzzyStreetHouse('', '12')).toEqual([]);
            expect(directory.findFuzzyStreetHouse('Hovedgaden', ' ')).toEqual([]);
        });

        test('drops candidates below the threshold and ranks known postcodes first', () => {
            directory.load(addressTable([
                ['Hovedgaden', '12', '', '4000', '101'],
                ['Hovedvejen', '12', '', '4000', '101'],
                ['Hovedgade', '12', '', '9999', '301'],
            ]), CITIES);

            // HOVEDGADE scores higher, but 9999 has no known city
            const hits = directory.findFuzzyStreetHouse('Hovedgad', '12');
            expect(hits.map((a) => a.display)).toEqual([
                'Hovedgaden 12, 4000 Roskilde',
                'Hovedgade 12, 9999',
            ]);
        });

        test('minScore can be raised', () => {
            expect(directory.findFuzzyStreetHouse('Hovedgadn', '12', '', 20, 0.95)).toEqual([]);
        });
    });

    describe('findByDisplayContains', () => {
        test('matches a normalized substring of the display text', () => {
            expect(directory.findByDisplayContains('gaden 12').map((a) => a.normKey)).toEqual([
                'HOVEDGADEN 12 4000',
                'HOVEDGADEN 12 A 4000',
            ]);
            expect(directory.findByDisplayContains('ringsted').map((a) => a.normKey)).toEqual([
                'SKOLEVEJ 7 B 4100',
            ]);
        });

        test('blank query gives nothing', () => {
            expect(directory.findByDisplayContains(' , ')).toEqual([]);
        });
    });
});

describe('formatDisplay', () => {
    test('joins the house letter to the number', () => {
        expect(formatDisplay('Skolevej', '7', 'B', '4100', 'Ringsted')).toBe('Skolevej 7B, 4100 Ringsted');
    });

    test('drops an unknown city', () => {
        expect(formatDisplay('Skolevej', '7', '', '4100', '')).toBe('Skolevej 7, 4100');
    });
});

describe('makeManualAddress', () => {
    test('trims input and defaults optional parts', () => {
        const address = makeManualAddress({ street: ' Nyvej ', houseNo: ' 3 ', postcode: '4000 ' });

        expect(address).toEqual({
            kind: 'manual',
            display: 'Nyvej 3, 4000',
            districtNo: '',
            street: 'Nyvej',
            houseNo: '3',
            houseLetter: '',
            postcode: '4000',
            city: '',
        });
    });
});
