export { type CharacterSource, StringSource } from './character-source.ts'
