#!/usr/bin/env node
import { main } from './podline';

void main();
