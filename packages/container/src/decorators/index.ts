export { Inject } from './inject.js';
export { Injectable } from './injectable.js';
