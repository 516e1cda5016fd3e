import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import Visualizer from './Visualizer';
import { resolveConfig } from './visualizer/config';
import './index.css';

const root = document.getElementById('root');
if (!root) throw new Error('missing #root element');

createRoot(root).render(
  <StrictMode>
    <Visualizer config={resolveConfig(import.meta.env)} />
  </StrictMode>
);
