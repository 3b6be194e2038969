export { BinaryWriter, BinaryReader, BinaryReadError } from './binary.js';
