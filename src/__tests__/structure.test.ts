import { describe, it, expect } from 'vitest';
import {
    extractFigures,
    extractReferences,
    extractSections,
    extractTables,
    parseHeading,
    renderMarkdown,
} from '../document/structure.js';

describe('Document structure', () => {
    describe('parseHeading', () => {
        it('should recognise numbered headings with their depth', () => {
            expect(parseHeading('1 Introduction')).toEqual({ title: 'Introduction', level: 1 });
            expect(parseHeading('2.1. Datasets')).toEqual({ title: 'Datasets', level: 2 });
            expect(parseHeading('4.2.1 Ablation study')).toEqual({ title: 'Ablation study', level: 3 });
        });

        it('should recognise well-known unnumbered headings', () => {
            expect(parseHeading('Abstract')).toEqual({ title: 'Abstract', level: 1 });
            expect(parseHeading('  References:  ')).toEqual({ title: 'References', level: 1 });
            expect(parseHeading('RELATED WORK')).toEqual({ title: 'RELATED WORK', level: 1 });
        });

        it('should leave body text alone', () => {
            expect(parseHeading('We train the model for 10 epochs.')).toBeNull();
            expect(parseHeading('3 results were obtained')).toBeNull();
            expect(parseHeading('')).toBeNull();
        });
    });

    describe('extractSections', () => {
        const pages = [
            'Preamble text\nAbstract\nWe study X.\n1 Introduction\nGraphs are useful.',
            'More intro.\n2 Method\nWe do Y.\nReferences\n[1] A. Author. Title one.\n[2] B. Author. Title\ntwo continued.',
        ];

        it('should split at headings across page boundaries', () => {
            expect(extractSections(pages)).toEqual([
                { title: 'Abstract', level: 1, content: 'We study X.' },
                { title: 'Introduction', level: 1, content: 'Graphs are useful.\nMore intro.' },
                { title: 'Method', level: 1, content: 'We do Y.' },
                {
                    title: 'References',
                    level: 1,
                    content: '[1] A. Author. Title one.\n[2] B. Author. Title\ntwo continued.',
                },
            ]);
        });

        it('should keep numbered reference entries inside the references section', () => {
            const sections = extractSections([
                '1 Introduction\nWe revisit attention.\nReferences\n1. Vaswani A, Shazeer N, Parmar N\n2. Devlin J, Chang M, Lee K, Toutanova K\n3. Brown T, Mann B, Ryder N',
                'Appendix\nExtra tables.',
            ]);

            expect(sections.map((s) => s.title)).toEqual(['Introduction', 'References', 'Appendix']);
            expect(extractReferences(sections)).toEqual([
                '1. Vaswani A, Shazeer N, Parmar N',
                '2. Devlin J, Chang M, Lee K, Toutanova K',
                '3. Brown T, Mann B, Ryder N',
            ]);
        });

        it('should return no sections for text without headings', () => {
            expect(extractSections(['just some text', 'on two pages'])).toEqual([]);
        });
    });

    describe('extractReferences', () => {
        it('should split on markers and join wrapped lines', () => {
            const sections = [
                { title: 'References', level: 1, content: '[1] A. Author. Title one.\n[2] B. Author. Title\ntwo continued.' },
            ];
            expect(extractReferences(sections)).toEqual([
                '[1] A. Author. Title one.',
                '[2] B. Author. Title two continued.',
            ]);
        });

        it('should use one entry per line without markers', () => {
            const sections = [
                { title: 'Bibliography', level: 1, content: 'Smith, J. Paper A\n\nDoe, J. Paper B' },
            ];
            expect(extractReferences(sections)).toEqual(['Smith, J. Paper A', 'Doe, J. Paper B']);
        });

        it('should return [] without a references section', () => {
            expect(extractReferences([{ title: 'Introduction', level: 1, content: '[1] not a reference list' }])).toEqual([]);
        });
    });

    describe('captions', () => {
        const pages = [
            'Intro\nFigure 1: Overview of the model.\nbody',
            'Fig. 2. Results\nTable 1: Accuracy by dataset',
        ];

        it('should extract figure captions with their page', () => {
            expect(extractFigures(pages)).toEqual([
                { caption: 'Figure 1: Overview of the model.', page: 1 },
                { caption: 'Figure 2: Results', page: 2 },
            ]);
        });

        it('should extract table captions with empty data', () => {
            expect(extractTables(pages)).toEqual([
                { caption: 'Table 1: Accuracy by dataset', data: [], page: 2 },
            ]);
        });
    });

    describe('renderMarkdown', () => {
        it('should render the title and sections one level below their depth', () => {
            const markdown = renderMarkdown(
                'Paper',
                [
                    { title: 'Introduction', level: 1, content: 'Text.' },
                    { title: 'Datasets', level: 2, content: '' },
                ],
                'ignored'
            );
            expect(markdown).toBe('# Paper\n\n## Introduction\n\nText.\n\n### Datasets');
        });

        it('should cap heading depth at six', () => {
            expect(renderMarkdown('', [{ title: 'Deep', level: 6, content: '' }], '')).toBe('###### Deep');
        });

        it('should fall back to the raw text without sections', () => {
            expect(renderMarkdown('', [], '  raw text \n')).toBe('raw text');
            expect(renderMarkdown('T', [], 'body')).toBe('# T\n\nbody');
        });
    });
});
