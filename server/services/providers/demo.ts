import type { InsightDocument, InsightProvider } from './types';

const listDocuments = (documents: InsightDocument[]): string =>
  documents.map((doc) => `• ${doc.name} (${doc.type})`).join('\n');

export const renderDemoInsights = (query: string, documents: InsightDocument[]): string => {
  const count = documents.length;
  return [
    '**Demo Mode Response**',
    '',
    `Thank you for your question: "${query}"`,
    '',
    'I would analyze the following documents to provide insights:',
    listDocuments(documents),
    '',
    '**Sample Analysis:**',
    `Based on the ${count} document${count === 1 ? '' : 's'} provided, here are some key points I would typically identify:`,
    '',
    '• **Document Summary**: I would extract the main themes and topics from each document',
    '• **Key Insights**: Important findings, recommendations, or action items would be highlighted',
    '• **Cross-Document Analysis**: Connections and patterns across multiple documents would be identified',
    '• **Actionable Items**: Specific next steps or recommendations would be provided',
    '',
    '**Note**: This is a demo response. To get actual AI-powered insights, set AI_PROVIDER to one of the supported providers:',
    '- openai (OpenAI)',
    '- azure (Azure OpenAI)',
    '- google (Google Gemini)',
    '- anthropic (Anthropic Claude)',
    '- ollama (local models through Ollama)',
    '',
  ].join('\n');
};

export const renderDemoSummary = (document: InsightDocument): string =>
  `**Demo Summary for: ${document.name}**\n\nThis document contains ${document.content.length} characters of content. ` +
  'In a real implementation, this would be an AI-generated summary highlighting the key points, ' +
  'main themes, and important findings from the document.';

export const DEMO_TOPICS = ['Demo Topic 1', 'Demo Topic 2', 'Demo Topic 3', 'Demo Topic 4', 'Demo Topic 5'];

/** Offline provider: never touches the network and always answers the same way. */
export const createDemoProvider = (): InsightProvider => ({
  name: 'demo',
  async generate(request) {
    return renderDemoInsights(request.query, request.documents);
  },
});
