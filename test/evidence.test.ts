import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { EvidenceStore, evidenceIdFor } from '../src/evidence/EvidenceStore';
import { EvidenceRetriever, cosineSimilarity, excerpt, extractKeywords, hybridScore } from '../src/evidence/EvidenceRetriever';
import { Redactor } from '../src/evidence/Redactor';
import { EmbeddingsProvider, OracleOutcome } from '../src/llm/Oracle';
import { ReasoningClient } from '../src/llm/ReasoningClient';
import { RetryPolicy } from '../src/llm/RetryPolicy';
import { SessionIOError, ValidationError } from '../src/errors';
import { ScriptedOracle, makeEvidence, noSleep, ok } from './helpers';

describe('EvidenceStore', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'evidence-'));
    });

    afterEach(() => {
        fs.removeSync(dir);
    });

    test('Keeps short output inline', async () => {
        const store = new EvidenceStore(dir, 10);

        expect(await store.store('s1', 'short')).toEqual({ kind: 'inline', text: 'short' });
        expect(await store.list('s1')).toEqual([]);
    });

    test('Moves output at the threshold to an external file', async () => {
        const store = new EvidenceStore(dir, 10);
        const content = '0123456789';

        const ref = await store.store('s1', content, '!threads');

        expect(ref).toEqual({ kind: 'external', evidenceId: evidenceIdFor('s1', content), size: 10 });
        expect(await store.resolve(ref)).toBe(content);
        const index = await store.list('s1');
        expect(index).toHaveLength(1);
        expect(index[0].command).toBe('!threads');
        expect(index[0].size).toBe(10);
    });

    test('Ids depend on session and content only', async () => {
        const store = new EvidenceStore(dir, 1);

        const first = await store.put('s1', 'same output');
        const again = await store.put('s1', 'same output');
        const other = await store.put('s2', 'same output');

        expect(again).toBe(first);
        expect(other).not.toBe(first);
        expect(first).toMatch(/^ev_[0-9a-f]{24}$/);
        expect(await store.list('s1')).toHaveLength(1);
    });

    test('Finds evidence written by another store instance', async () => {
        const id = await new EvidenceStore(dir, 1).put('s1', 'persisted');

        expect(await new EvidenceStore(dir, 1).get(id)).toBe('persisted');
    });

    test('Rejects malformed and unknown ids', async () => {
        const store = new EvidenceStore(dir, 1);

        await expect(store.get('../../etc/passwd')).rejects.toThrow(ValidationError);
        await expect(store.get('ev_000000000000000000000000')).rejects.toThrow(SessionIOError);
    });
});

describe('EvidenceRetriever', () => {
    const inventory = {
        'Check threads': [
            makeEvidence('!threads', 'Found 40 threads in the process.'),
            makeEvidence('lm', null)
        ],
        'Check locks': [
            makeEvidence('!syncblk', 'Found 3 sync blocks with contention out of 5 total. Lock contention on threads.')
        ]
    };

    function reranker(outcomes: OracleOutcome[]): { oracle: ScriptedOracle; reasoning: ReasoningClient } {
        const oracle = new ScriptedOracle(outcomes);
        const reasoning = new ReasoningClient(
            oracle,
            new RetryPolicy({ maxAttempts: 1, baseDelaySeconds: 0, multiplier: 1 }),
            { temperature: 0.1, maxTokens: 500, sleep: noSleep }
        );
        return { oracle, reasoning };
    }

    test('Extracts keywords without stopwords or short words', () => {
        expect(extractKeywords('Why are there so many blocked threads?')).toEqual(['many', 'blocked', 'threads']);
    });

    test('Ranks by keyword occurrences and drops entries without a hit', async () => {
        const retriever = new EvidenceRetriever(null);

        expect((await retriever.findRelevant('lock contention', inventory, 5, false)).map(e => e.command)).toEqual(['!syncblk']);
        expect(await retriever.findRelevant('unrelated question', inventory, 5, false)).toEqual([]);
    });

    test('Keeps collection order for equal scores and honours topK', async () => {
        const retriever = new EvidenceRetriever(null);

        expect((await retriever.findRelevant('found', inventory, 1, false)).map(e => e.command)).toEqual(['!threads']);
        expect(await retriever.findRelevant('threads', inventory, 0, false)).toEqual([]);
        expect(await retriever.findRelevant('threads', {}, 3, false)).toEqual([]);
    });

    test('Ranks by cosine similarity and redacts what it embeds', async () => {
        const seen: string[][] = [];
        const provider: EmbeddingsProvider = {
            embed: async (texts) => {
                seen.push(texts);
                return texts.map(t => (t.includes('syncblk') ? [0, 1] : [1, 0]));
            }
        };
        const retriever = new EvidenceRetriever(provider, { redactor: new Redactor() });

        const ranked = await retriever.findRelevant('mail ops@corp.example about !syncblk', inventory, 2, true);

        expect(ranked.map(e => e.command)).toEqual(['!syncblk', '!threads']);
        expect(seen[0][0]).toBe('mail [REDACTED:EmailAddress] about !syncblk');
        expect(seen[0]).toHaveLength(3);
    });

    test('Blends keyword hits into the semantic score', async () => {
        const provider: EmbeddingsProvider = { embed: async (texts) => texts.map(() => [1, 0]) };
        const retriever = new EvidenceRetriever(provider);

        const ranked = await retriever.findRelevant('lock contention', inventory, 2, true);

        expect(ranked.map(e => e.command)).toEqual(['!syncblk', '!threads']);
        expect(hybridScore(1, 3)).toBeCloseTo(0.79);
        expect(hybridScore(0.5, 25)).toBeCloseTo(0.65);
    });

    test('Embeds each evidence entry only once', async () => {
        const seen: string[][] = [];
        const provider: EmbeddingsProvider = {
            embed: async (texts) => {
                seen.push(texts);
                return texts.map(() => [1, 0]);
            }
        };
        const retriever = new EvidenceRetriever(provider);

        await retriever.findRelevant('lock contention', inventory, 2, true);
        await retriever.findRelevant('thread count', inventory, 2, true);

        expect(seen[0]).toHaveLength(3);
        expect(seen[1]).toEqual(['thread count']);
    });

    test('Falls back to keywords when embeddings fail', async () => {
        const provider: EmbeddingsProvider = {
            embed: async () => {
                throw new Error('quota exceeded');
            }
        };
        const retriever = new EvidenceRetriever(provider);

        const ranked = await retriever.findRelevant('lock contention', inventory, 5, true);

        expect(ranked.map(e => e.command)).toEqual(['!syncblk']);
    });

    describe('reranking', () => {
        const heap = {
            'Check memory': [
                makeEvidence('!eeheap', 'GC heap is 2.0 GB'),
                makeEvidence('!dumpheap -stat', 'Heap contains 5120 objects'),
                makeEvidence('!gcroot 0000024f8c7e5a30', 'Object is rooted from the heap')
            ]
        };

        test('Lets the oracle reorder candidates, ignoring bad indices', async () => {
            const { oracle, reasoning } = reranker([ok({ indices: [2, 7, 2, 0] })]);
            const retriever = new EvidenceRetriever(null, { reranker: reasoning });

            const ranked = await retriever.findRelevant('heap usage', heap, 2, false);

            expect(ranked.map(e => e.command)).toEqual(['!gcroot 0000024f8c7e5a30', '!eeheap']);
            expect(oracle.calls[0].temperature).toBe(0);
            expect(oracle.calls[0].messages[1].content).toContain('[2] !gcroot 0000024f8c7e5a30: Object is rooted from the heap');
        });

        test('Keeps score order when the oracle fails', async () => {
            const { reasoning } = reranker([]);
            const retriever = new EvidenceRetriever(null, { reranker: reasoning });

            const ranked = await retriever.findRelevant('heap usage', heap, 2, false);

            expect(ranked.map(e => e.command)).toEqual(['!eeheap', '!dumpheap -stat']);
        });

        test('Skips the oracle when every candidate fits', async () => {
            const { oracle, reasoning } = reranker([ok({ indices: [0] })]);
            const retriever = new EvidenceRetriever(null, { reranker: reasoning });

            expect(await retriever.findRelevant('heap usage', heap, 3, false)).toHaveLength(3);
            expect(oracle.calls).toHaveLength(0);
        });
    });

    test('Cosine similarity of a zero vector is zero', () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
        expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    });

    test('Cuts long output with a truncation marker', () => {
        expect(excerpt('abc', 4)).toBe('abc');
        expect(excerpt('abcdef', 4)).toBe('abcd\n\n[... truncated 2 chars ...]');
    });

    test('Formats evidence for prompts', async () => {
        const retriever = new EvidenceRetriever(null);
        const evidence = makeEvidence('!threads', 'Found 40 threads in the process.', {
            finding: 'Found 40 threads in the process.',
            significance: 'Total threads: 40'
        });

        expect(await retriever.formatForPrompt([])).toBe('(no evidence collected yet)');
        expect(await retriever.formatForPrompt([evidence])).toBe([
            '[1] !threads (confidence: medium)',
            '    Finding: Found 40 threads in the process.',
            '    Summary: Found 40 threads in the process.',
            '    Significance: Total threads: 40'
        ].join('\n'));
    });

    test('Shows raw output for evidence no analyzer understood', async () => {
        const retriever = new EvidenceRetriever(null);
        const evidence = makeEvidence('!pe', null, {
            outputRef: { kind: 'inline', text: 'Exception type: System.OutOfMemoryException\nMessage: <none>' }
        });

        expect(await retriever.formatForPrompt([evidence])).toBe([
            '[1] !pe (confidence: low)',
            '    Finding: Raw output captured (10 chars)',
            '    Output:',
            '      Exception type: System.OutOfMemoryException',
            '      Message: <none>'
        ].join('\n'));
    });

    describe('stored output', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'retriever-'));
        });

        afterEach(() => {
            fs.removeSync(dir);
        });

        test('Loads an excerpt of externally stored output', async () => {
            const store = new EvidenceStore(dir, 10);
            const content = 'a'.repeat(5000) + 'bcd';
            const outputRef = await store.store('s1', content, '!dumpheap');
            const evidence = makeEvidence('!dumpheap', null, { outputRef });

            expect(await new EvidenceRetriever(null, { store }).formatForPrompt([evidence])).toBe([
                '[1] !dumpheap (confidence: low)',
                '    Finding: Raw output captured (10 chars)',
                '    Output:',
                '      ' + 'a'.repeat(5000),
                '',
                '      [... truncated 3 chars ...]'
            ].join('\n'));
            expect(await new EvidenceRetriever(null).formatForPrompt([evidence])).toBe([
                '[1] !dumpheap (confidence: low)',
                '    Finding: Raw output captured (10 chars)',
                '    Output:',
                `      (5003 chars stored as ${evidenceIdFor('s1', content)})`
            ].join('\n'));
        });
    });
});
