export { JsonRepository } from './json-repository.js';
export type { RepositoryOptions } from './json-repository.js';
export { NoteRepository } from './note-repository.js';
export { AssignmentRepository } from './assignment-repository.js';
