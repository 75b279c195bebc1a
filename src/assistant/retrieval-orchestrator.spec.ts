import * as path from 'path';
import {
  createTempDir,
  createTestConfig,
  removeTempDir,
  writeFixture,
} from '../../test/fixtures/test-config';
import {
  type AssistantTestContext,
  createAssistantTestingModule,
} from '../../test/fixtures/testing-module';
import { IndexState } from '../knowledge-base/knowledge-base.types';
import { InvalidSearchParameterError } from '../vector-store/vector-store.errors';
import {
  ERROR_ANSWER,
  NO_CONTEXT_MESSAGE,
  NO_DOCUMENTS_ANSWER,
  NO_DOCUMENTS_MESSAGE,
} from './assistant.types';

const VACATION =
  'Employees receive 20 vacation days per year. Vacation requests go through the HR portal.';
const EXPENSES =
  'Expense reports are due by the fifth business day of each month.';
const QUESTION = 'How many vacation days do employees receive?';

describe('RetrievalOrchestrator', () => {
  let root: string;
  let docsDirectory: string;
  let context: AssistantTestContext;

  async function start(
    env: Record<string, string> = {},
    responses?: string[],
  ): Promise<void> {
    context = await createAssistantTestingModule(
      createTestConfig({
        VECTOR_DB_DIRECTORY: path.join(root, 'index'),
        DOCS_DIRECTORY: docsDirectory,
        RETRIEVAL_K: '2',
        SOURCE_PREVIEW_LENGTH: '20',
        GENERATION_TIMEOUT_MS: '50',
        ...env,
      }),
      responses,
    );
  }

  async function writeDocs(): Promise<void> {
    await writeFixture(docsDirectory, 'vacation.md', VACATION);
    await writeFixture(docsDirectory, 'expenses.txt', EXPENSES);
  }

  beforeEach(async () => {
    root = await createTempDir();
    docsDirectory = path.join(root, 'docs');
  });

  afterEach(async () => {
    await context.moduleRef.close();
    await removeTempDir(root);
  });

  describe('before any document is loaded', () => {
    beforeEach(async () => {
      await start();
    });

    it('answers with an error without calling the model', async () => {
      const invoke = jest.spyOn(context.chatModel, 'invoke');

      const result = await context.sessions.getOrCreate().ask(QUESTION);

      expect(result).toEqual({
        status: 'error',
        question: QUESTION,
        answer: NO_DOCUMENTS_ANSWER,
        message: NO_DOCUMENTS_MESSAGE,
        sources: [],
        sourceCount: 0,
      });
      expect(invoke).not.toHaveBeenCalled();
    });

    it('warns when the directory holds no documents', async () => {
      const result = await context.sessions.getOrCreate().loadDocuments();

      expect(result).toEqual({
        status: 'warning',
        message: 'No documents found',
        failures: [],
      });
      expect(context.knowledgeBase.state).toBe(IndexState.UNINITIALIZED);
    });
  });

  describe('adding single documents', () => {
    beforeEach(async () => {
      await start({}, ['Employees receive 20 vacation days per year.']);
    });

    it('makes the index ready', async () => {
      const filePath = await writeFixture(docsDirectory, 'vacation.md', VACATION);
      const orchestrator = context.sessions.getOrCreate();

      const added = await orchestrator.addDocument(filePath);

      expect(added).toEqual({
        status: 'success',
        message: 'Added vacation.md (1 chunks)',
        chunkCount: 1,
      });
      expect(context.knowledgeBase.state).toBe(IndexState.READY);
      expect((await orchestrator.ask(QUESTION)).status).toBe('success');
    });

    it('reports an unsupported file as an error', async () => {
      const filePath = await writeFixture(docsDirectory, 'diagram.png', 'png');

      const added = await context.sessions.getOrCreate().addDocument(filePath);

      expect(added).toEqual({
        status: 'error',
        message:
          'Failed to process document: Unsupported file type: .png. Please use PDF, DOCX, TXT or MD files.',
        chunkCount: 0,
      });
      expect(context.knowledgeBase.state).toBe(IndexState.UNINITIALIZED);
    });

    it('reports a missing file as an error', async () => {
      const filePath = path.join(docsDirectory, 'missing.md');

      const added = await context.sessions.getOrCreate().addDocument(filePath);

      expect(added).toEqual({
        status: 'error',
        message: `Failed to process document: File or directory not found: ${filePath}`,
        chunkCount: 0,
      });
    });

    it('duplicates the chunks of a document added twice', async () => {
      const filePath = await writeFixture(docsDirectory, 'vacation.md', VACATION);
      const orchestrator = context.sessions.getOrCreate();

      await orchestrator.addDocument(filePath);
      await orchestrator.addDocument(filePath);

      expect(await context.knowledgeBase.store.count()).toBe(2);
      const hits = await orchestrator.search(QUESTION, 2);
      expect(hits.map((hit) => hit.content)).toEqual([VACATION, VACATION]);
    });
  });

  describe('with loaded documents', () => {
    beforeEach(async () => {
      await writeDocs();
      await start({}, ['Employees receive 20 vacation days per year.']);
      const loaded = await context.sessions.getOrCreate().loadDocuments();
      expect(loaded.status).toBe('success');
    });

    it('answers from the retrieved passages', async () => {
      const invoke = jest.spyOn(context.chatModel, 'invoke');
      const orchestrator = context.sessions.getOrCreate();

      const result = await orchestrator.ask(QUESTION);

      expect(result.status).toBe('success');
      expect(result.answer).toBe('Employees receive 20 vacation days per year.');
      expect(result.sourceCount).toBe(2);
      expect(result.sources[0]).toMatchObject({
        chunkIndex: 0,
        content: 'Employees receive 20...',
        metadata: { fileName: 'vacation.md', fileType: '.md' },
      });
      expect(result.sources[0].score).toBeGreaterThan(result.sources[1].score);

      const prompt = String(invoke.mock.calls[0][0]);
      expect(prompt).toContain(
        `Context:\n${VACATION}\n\n${EXPENSES}\n\nQuestion: ${QUESTION}\n\nAnswer: `,
      );
    });

    it('hands out copies of source metadata', async () => {
      const orchestrator = context.sessions.getOrCreate();

      const result = await orchestrator.ask(QUESTION);
      result.sources[0].metadata.fileName = 'edited.md';
      const [hit] = await orchestrator.search(QUESTION, 1);
      hit.metadata.fileName = 'edited-again.md';

      const [again] = await orchestrator.search(QUESTION, 1);
      expect(again.metadata.fileName).toBe('vacation.md');
    });

    it('remembers successful turns until reset', async () => {
      const orchestrator = context.sessions.getOrCreate();

      await orchestrator.ask(QUESTION);

      expect(orchestrator.getConversationHistory()).toEqual([
        {
          question: QUESTION,
          answer: 'Employees receive 20 vacation days per year.',
          askedAt: expect.any(Date),
        },
      ]);

      orchestrator.resetConversation();

      expect(orchestrator.getConversationHistory()).toEqual([]);
      expect(context.knowledgeBase.state).toBe(IndexState.READY);
      expect((await orchestrator.ask(QUESTION)).status).toBe('success');
    });

    it('omits sources on request', async () => {
      const result = await context.sessions
        .getOrCreate()
        .ask(QUESTION, { includeSources: false });

      expect(result.sources).toEqual([]);
      expect(result.sourceCount).toBe(2);
    });

    it('reports a generation failure', async () => {
      jest
        .spyOn(context.chatModel, 'invoke')
        .mockRejectedValue(new Error('model offline'));
      const orchestrator = context.sessions.getOrCreate();

      const result = await orchestrator.ask(QUESTION);

      expect(result).toEqual({
        status: 'error',
        question: QUESTION,
        answer: ERROR_ANSWER,
        message: 'model offline',
        sources: [],
        sourceCount: 0,
      });
      expect(orchestrator.getConversationHistory()).toEqual([]);
    });

    it('reports a generation timeout', async () => {
      jest
        .spyOn(context.chatModel, 'invoke')
        .mockImplementation(() => new Promise<never>(() => undefined));

      const result = await context.sessions.getOrCreate().ask(QUESTION);

      expect(result.status).toBe('error');
      expect(result.message).toBe('Answer generation timed out after 50ms');
    });

    it('reports an embedding failure', async () => {
      jest
        .spyOn(context.embeddings, 'embedQuery')
        .mockRejectedValue(new Error('connection refused'));

      const result = await context.sessions.getOrCreate().ask(QUESTION);

      expect(result.status).toBe('error');
      expect(result.message).toBe(
        'Failed to embed query: connection refused',
      );
    });

    it('searches without touching the conversation', async () => {
      const orchestrator = context.sessions.getOrCreate();

      const hits = await orchestrator.search('expense reports due', 1);

      expect(hits).toHaveLength(1);
      expect(hits[0].content).toBe(EXPENSES);
      expect(hits[0].metadata.fileName).toBe('expenses.txt');
      expect(orchestrator.getConversationHistory()).toEqual([]);
    });

    it('rejects a non-positive k', async () => {
      await expect(
        context.sessions.getOrCreate().search('vacation', 0),
      ).rejects.toThrow(InvalidSearchParameterError);
    });

    it('returns no hits when the search fails', async () => {
      jest
        .spyOn(context.embeddings, 'embedQuery')
        .mockRejectedValue(new Error('connection refused'));

      expect(await context.sessions.getOrCreate().search('vacation')).toEqual(
        [],
      );
    });

    it('keeps conversations apart per session', async () => {
      const first = context.sessions.getOrCreate('first');
      const second = context.sessions.getOrCreate('second');

      await first.ask(QUESTION);

      expect(first.getConversationHistory()).toHaveLength(1);
      expect(second.getConversationHistory()).toEqual([]);
      expect(context.sessions.getOrCreate('first')).toBe(first);
    });

    it('stays ready after its documents are removed', async () => {
      const orchestrator = context.sessions.getOrCreate();

      const removed = await orchestrator.removeDocument(
        path.join(docsDirectory, 'vacation.md'),
      );

      expect(removed).toEqual({
        status: 'success',
        message: `Removed 1 chunks of ${path.join(docsDirectory, 'vacation.md')}`,
        deletedCount: 1,
      });
      expect(context.knowledgeBase.state).toBe(IndexState.READY);
    });

    it('describes the system', async () => {
      const info = await context.sessions.getOrCreate('info').getSystemInfo();

      expect(info).toMatchObject({
        sessionId: 'info',
        state: IndexState.READY,
        hasDocuments: true,
        documentCount: 2,
        vectorStore: {
          type: 'local',
          location: path.join(root, 'index', 'index.json'),
        },
        documentsDirectory: docsDirectory,
        llm: { provider: 'ollama', model: 'gemma3:1b' },
        chunkSize: 1000,
        chunkOverlap: 200,
        retrievalK: 2,
        similarityThreshold: null,
        conversationLength: 0,
      });
    });
  });

  describe('with a similarity threshold', () => {
    beforeEach(async () => {
      await writeDocs();
      await start({ SIMILARITY_THRESHOLD: '0.99' });
      await context.sessions.getOrCreate().loadDocuments();
    });

    it('warns without calling the model when nothing is similar enough', async () => {
      const invoke = jest.spyOn(context.chatModel, 'invoke');

      const result = await context.sessions.getOrCreate().ask(QUESTION);

      expect(result.status).toBe('warning');
      expect(result.message).toBe(NO_CONTEXT_MESSAGE);
      expect(invoke).not.toHaveBeenCalled();
    });
  });

  describe('chat', () => {
    beforeEach(async () => {
      await start({}, ['Hello there.', 'You said hello.']);
    });

    it('passes earlier turns as history', async () => {
      const invoke = jest.spyOn(context.chatModel, 'invoke');
      const orchestrator = context.sessions.getOrCreate();

      const first = await orchestrator.chat('Hello');
      const second = await orchestrator.chat('What did I say?');

      expect(first.answer).toBe('Hello there.');
      expect(second.answer).toBe('You said hello.');
      expect(String(invoke.mock.calls[1][0])).toContain('Human: Hello\nAI: Hello there.');
      expect(orchestrator.getConversationHistory()).toHaveLength(2);
    });
  });
});
