import { label } from './label'

const canvas = document.getElementById('renderCanvas')
if (canvas) canvas.title = label('fixture')
