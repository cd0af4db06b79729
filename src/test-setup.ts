// Decorator metadata (class-transformer, NestJS) needs the Reflect polyfill before anything decorated loads
import 'reflect-metadata';
