import type { Problem, Solution } from '../kernel-core/L0/Ontology.js';
import { loadNodeConfig } from '../infrastructure/config/Config.js';
import { startNode } from './NodePlatform.js';

const DEMO_PROBLEMS: { problem: Problem; solution: Solution }[] = [
    {
        problem: {
            id: 'demo-orbit-01',
            difficulty: 0.3,
            requiredDomains: ['physics', 'mathematics'],
            question: 'Why does orbital period grow with the semi-major axis of the orbit?'
        },
        solution: {
            answer: 'The orbital period grows with the semi-major axis because gravity weakens with distance, so a larger orbit is both longer and slower.',
            reasoning: 'Kepler third law: period squared is proportional to the semi-major axis cubed.'
        }
    },
    {
        problem: {
            id: 'demo-cache-02',
            difficulty: 0.5,
            requiredDomains: ['computer_science', 'engineering'],
            question: 'How does a write-back cache keep memory consistent?'
        },
        solution: {
            answer: 'A write-back cache marks modified lines dirty and writes them to memory only on eviction or flush, which keeps memory consistent once dirty lines are written back; coherence protocols keep other caches consistent meanwhile.',
            reasoning: 'Dirty bits defer writes; coherence (MESI) invalidates stale copies in other caches.'
        }
    }
];

async function bootstrap() {
    const config = loadNodeConfig();
    const platform = await startNode(config);
    const { node } = platform;

    try {
        const accountId = 'demo-account';
        await node.registerAccount(accountId);

        for (const { problem, solution } of DEMO_PROBLEMS) {
            const result = await node.submitSolution(accountId, problem, solution);
            console.log(`[Node] ${problem.id}: accepted=${result.accepted} quality=${result.quality.toFixed(3)}`);
        }
        await node.regenerate(accountId, 60);

        const outcome = await node.mineBlock();
        console.log(`[Node] Mining finished: ${outcome.status}, chain length ${node.getChainLength()}`);

        const account = await node.getAccount(accountId);
        console.log(`[Node] ${accountId}: C=${account.complexityIndex.toFixed(4)} E=${account.energy.toFixed(2)} tier=${account.tier}`);
    } finally {
        platform.close();
    }
}

bootstrap().catch((e) => {
    console.error(e);
    process.exitCode = 1;
});
