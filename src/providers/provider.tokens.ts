export const EMBEDDINGS = 'EMBEDDINGS';
export const CHAT_MODEL = 'CHAT_MODEL';
