import { AgentCardBuilder } from '../../src/agent/AgentCardBuilder.js';
import type { AgentCard, AgentCapabilities } from '../../src/types/agent-card.js';

/** A complete card for a test agent. */
export function testCard(capabilities: AgentCapabilities = { streaming: true, pushNotifications: true }): AgentCard {
  return new AgentCardBuilder()
    .name('Research Agent')
    .description('Finds and summarizes sources')
    .version('1.2.0')
    .url('http://127.0.0.1/')
    .protocolVersion('0.3')
    .capabilities(capabilities)
    .skill({ id: 'search', name: 'Search', description: 'Searches the web', tags: ['research'] })
    .skill({ id: 'summarize', name: 'Summarize', description: 'Condenses documents', tags: ['writing'] })
    .defaultInputModes(['text/plain'])
    .defaultOutputModes(['text/plain', 'application/json'])
    .build();
}

export const TEST_PRIVATE_KEY = '01'.repeat(32);
export const OTHER_PRIVATE_KEY = '02'.repeat(32);
