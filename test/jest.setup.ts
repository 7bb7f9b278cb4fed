import 'reflect-metadata';
import { Logger } from '@nestjs/common';

// Keep spec output readable; services still log through their Logger instances.
Logger.overrideLogger(false);
