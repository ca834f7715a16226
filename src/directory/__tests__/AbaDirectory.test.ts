import { describe, test, expect, beforeEach } from 'vitest';

import { DataSourceError } from '../../model/Errors.ts';
import { tableFromMatrix } from '../../source/TableSource.ts';
import { AbaDirectory, scoreAbaRow } from '../AbaDirectory.ts';
import { abaTable } from '../../__tests__/referenceData.ts';

import type { CellValue } from '../../model/Models.ts';

describe('scoreAbaRow', () => {
    test('usable primary dominates', () => {
        expect(scoreAbaRow({
            primaryResponse: 'ROIL1,ROM1',
            secondaryResponse: 'ROIL1,ROM2',
            status: 'I drift',
            name: 'Siloen',
        })).toBe(116);
    });

    test('error sentinel sinks the row', () => {
        expect(scoreAbaRow({ primaryResponse: '*FEJL*', secondaryResponse: '-', status: '', name: '' })).toBe(-100);
    });

    test('placeholder responses count for nothing', () => {
        expect(scoreAbaRow({ primaryResponse: '-', secondaryResponse: '', status: 'Aktiv', name: '' })).toBe(5);
    });
});

describe('AbaDirectory', () => {
    let directory: AbaDirectory;

    beforeEach(() => {
        directory = new AbaDirectory();
        directory.load(abaTable());
    });

    describe('load', () => {
        test('keeps in-service rows and the best row per address', () => {
            expect(directory.size).toBe(2);
            expect(directory.sites().map((s) => s.doaNo)).toEqual(['1002', '2001']);
        });

        test('the usable row wins whichever order the rows come in', () => {
            const broken: CellValue[] = ['1001', 'Maglehøjen 10', '4000 Roskilde', 'Siloen', '*FEJL*', '', 'I drift'];
            const usable: CellValue[] = ['1002', 'Maglehøjen 10', '4000 Roskilde', 'Siloen', 'ROIL1,ROM1', '', 'I drift'];

            directory.load(abaTable([usable, broken]));
            expect(directory.matchComponents('Maglehøjen', '10', '', '4000')?.doaNo).toBe('1002');

            directory.load(abaTable([broken, usable]));
            expect(directory.matchComponents('Maglehøjen', '10', '', '4000')?.doaNo).toBe('1002');
        });

        test('equal scores keep the earlier row', () => {
            directory.load(abaTable([
                ['5001', 'Algade 3', '4000 Roskilde', 'Butik', 'ROIL1', '', 'I drift'],
                ['5002', 'Algade 3', '4000 Roskilde', 'Butik', 'ROM1', '', 'I drift'],
            ]));

            expect(directory.sites().map((s) => s.doaNo)).toEqual(['5001']);
        });

        test('builds the site display and normalized address', () => {
            const site = directory.sites()[0];

            expect(site).toEqual({
                doaNo: '1002',
                name: '"Siloen" Ungdomsboliger',
                addressDisplay: 'Maglehøjen 10, 4000 Roskilde',
                addressNorm: 'MAGLEHØJEN 10 4000 ROSKILDE',
                primaryResponse: 'ROIL1,ROM1,ROV1',
                secondaryResponse: 'ROIL1,ROM2,ROV1',
                status: 'I drift',
            });
        });

        test('missing columns fail the load', () => {
            const table = tableFromMatrix('ABA alarmer.xlsx', [['DOA-nr', 'Adresse', 'Navn']]);
            expect(() => directory.load(table)).toThrow(DataSourceError);
        });
    });

    describe('matchAddress', () => {
        test('matches the normalized display address', () => {
            expect(directory.matchAddress('MAGLEHØJEN 10 4000 Roskilde')?.doaNo).toBe('1002');
        });

        test('sentinel sites and blank input give null', () => {
            expect(directory.matchAddress('Skolevej 7B, 4100 Ringsted')).toBeNull();
            expect(directory.matchAddress('  ')).toBeNull();
        });
    });

    describe('matchComponents', () => {
        test('matches on street, number and postcode', () => {
            expect(directory.matchComponents('Maglehøjen', '10', '', '4000')?.doaNo).toBe('1002');
        });

        test('falls back to the letterless key', () => {
            expect(directory.matchComponents('maglehøjen', '10', 'C', ' 4000 ')?.doaNo).toBe('1002');
        });

        test('letter written against the number still matches', () => {
            directory.load(abaTable([
                ['2002', 'Skolevej 7B', '4100 Ringsted', 'Skolen', 'RK1', '', 'I drift'],
            ]));

            expect(directory.matchComponents('Skolevej', '7', 'B', '4100')?.doaNo).toBe('2002');
        });

        test('a site whose response is the error sentinel is no match', () => {
            expect(directory.matchComponents('Skolevej', '7', 'B', '4100')).toBeNull();
        });

        test('sites not in service are never matched', () => {
            expect(directory.matchComponents('Hovedgaden', '12', '', '4000')).toBeNull();
        });

        test('different postcode is no match', () => {
            expect(directory.matchComponents('Maglehøjen', '10', '', '4100')).toBeNull();
        });

        test('containment fallback picks the highest scoring site', () => {
            directory.load(abaTable([
                ['6001', 'Nørre Algade 3', '4000 Roskilde', '', 'ROIL1', '', 'I drift'],
                ['6002', 'Søndre Algade 3', '4000 Roskilde', 'Skolen', 'ROIL1', 'ROM1', 'I drift'],
                ['6003', 'Vestre Algade 3', '4000 Roskilde', 'Hallen', 'ROIL1', 'ROM1', 'I drift'],
            ]));

            // 6002 and 6003 tie on score, the earlier row wins
            expect(directory.matchComponents('Algade', '3', '', '4000')?.doaNo).toBe('6002');
        });

        test('containment fallback with a single candidate', () => {
            directory.load(abaTable([
                ['6001', 'Nørre Algade 3', '4000 Roskilde', '', 'ROIL1', '', 'I drift'],
            ]));

            expect(directory.matchComponents('Algade', '3', '', '4000')?.doaNo).toBe('6001');
            expect(directory.matchComponents('Algade', '4', '', '4000')).toBeNull();
        });
    });
});
