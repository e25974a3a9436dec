import MaintenanceGantt from './components/maintenance/MaintenanceGantt'
import { LABELS } from './config'
import './App.css'

function App() {
  return (
    <div className="app">
      <h1>{LABELS.pageTitle}</h1>
      <MaintenanceGantt />
    </div>
  )
}

export default App
